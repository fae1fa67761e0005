import { Router } from "express";
import { snapshot } from "../stats.js";

const router = Router();

router.get("/metrics", (_req, res) => {
  res.json(snapshot());
});

export default router;
