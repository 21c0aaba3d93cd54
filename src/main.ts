#!/usr/bin/env node
import { startTuiApp } from "./index.js";

startTuiApp().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[parley] fatal: ${message}`);
  process.exitCode = 1;
});
