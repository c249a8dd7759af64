#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { configFromEnv, createLogger, createReimbursementSystem, errorMessage } from "../../reimbursement/index.js";
import { registerInvoiceTools } from "./tools/invoices.js";

const log = createLogger("mcp-server");

const system = await createReimbursementSystem(configFromEnv());
system.start();

const server = new McpServer({
  name: "invoice-reimbursement-mcp",
  version: "0.1.0",
});

registerInvoiceTools(server, system);

async function shutdown(signal: string): Promise<void> {
  log("info", `Received ${signal}, writing final snapshot`);
  try {
    await system.shutdown();
    await server.close();
  } catch (err) {
    log("error", "Shutdown failed", { error: errorMessage(err) });
    process.exitCode = 1;
  }
  process.exit();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

const transport = new StdioServerTransport();
await server.connect(transport);
