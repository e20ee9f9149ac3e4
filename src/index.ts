#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Config } from "./config.js";
import { createServer } from "./server.js";

// Load configuration up front so problems show up in the log at startup
await Config.getInstance();

const server = createServer();
const transport = new StdioServerTransport();
await server.connect(transport);
