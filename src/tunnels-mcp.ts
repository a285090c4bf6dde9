#!/usr/bin/env tsx
import { errorMessage } from "./errors";
import { runMcpServer } from "./mcp/main";

runMcpServer().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
