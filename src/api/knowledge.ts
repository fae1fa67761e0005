// Canned answers served without a model call.
const LAP_SIDING = {
  description:
    "Fiber cement lap siding combines the look of wood with the durability of cement: " +
    "it resists rot, termites and fire, and holds paint well.",
  installation: [
    "Start with proper wall preparation and moisture barrier",
    "Install starter strip at bottom of wall",
    "Cut siding with appropriate tools (circular saw with carbide blade)",
    'Maintain 1/4" gap at all joints and penetrations',
    "Use corrosion-resistant fasteners (stainless steel or galvanized)",
    "Pre-drill holes for nails to prevent cracking",
  ],
  tools: ["Circular saw with carbide blade", "Drill", "Level", "Chalk line", "Safety equipment"],
};

const TRIM_BOARDS = {
  description: "Fiber cement trim boards provide clean lines and architectural detail with the durability of fiber cement.",
};

const GENERAL_INSTALLATION = [
  "Always follow local building codes",
  'Maintain proper clearances (6" from grade, 2" from rooflines)',
  "Use proper flashing and weather barriers",
  "Prime and paint all cut edges within 60 days",
  "Store materials flat and off the ground",
];

/**
 * Answer from the built-in knowledge base, or undefined when the query needs the model.
 * Matching is by keyword, case-insensitive; lap siding wins over trim, trim over general installation.
 */
export function quickAnswer(query: string): string | undefined {
  const q = query.toLowerCase();

  if (q.includes("lap siding")) {
    if (q.includes("install")) {
      return (
        "Lap siding installation key steps:\n" +
        LAP_SIDING.installation.map((step, i) => `${i + 1}. ${step}`).join("\n")
      );
    }
    if (q.includes("tool")) {
      return `Tools needed for lap siding installation: ${LAP_SIDING.tools.join(", ")}`;
    }
    return LAP_SIDING.description;
  }

  if (q.includes("trim board")) {
    return TRIM_BOARDS.description;
  }

  if (q.includes("install")) {
    return "General fiber cement installation guidelines:\n" + GENERAL_INSTALLATION.map((step) => `• ${step}`).join("\n");
  }

  return undefined;
}
