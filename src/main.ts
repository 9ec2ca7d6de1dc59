// src/main.ts
import { startServer } from "./server";

startServer().catch((err: unknown) => {
  console.error("[routegate] failed to start", err);
  process.exit(1);
});
