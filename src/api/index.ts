import { startTestApp } from "./server.js";

startTestApp();
