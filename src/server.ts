import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ClassInspector } from "./class_inspector.js";
import { errorMessage } from "./errors.js";

/** Builds the MCP server with its tools registered; the caller connects a transport. */
export function createServer(): McpServer {
  const server = new McpServer(
    {
      name: "class-decoder",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    "decode_class_file",
    {
      description: "Decode a compiled Java class file into its full structure: constant pool, fields, methods and every attribute (Code, StackMapTable, annotations, Module, Record, ...). Returns JSON. Fails with a precise diagnostic if the file is malformed.",
      inputSchema: {
        path: z.string().describe("Path to a .class file"),
      },
    },
    async ({ path }) => {
      try {
        const classFile = await ClassInspector.decodeFile(path);
        return { content: [{ type: "text", text: ClassInspector.render(classFile) }] };
      } catch (e) {
        console.error(`Failed to decode ${path}:`, e);
        return { content: [{ type: "text", text: `Error decoding ${path}: ${errorMessage(e)}` }], isError: true };
      }
    }
  );

  server.registerTool(
    "describe_class_file",
    {
      description: "Summarize a compiled Java class file: class name, version, flags, super class, interfaces, fields and methods with their descriptors, and attribute names.",
      inputSchema: {
        path: z.string().describe("Path to a .class file"),
      },
    },
    async ({ path }) => {
      try {
        const classFile = await ClassInspector.decodeFile(path);
        const description = ClassInspector.describe(classFile, path);
        return { content: [{ type: "text", text: ClassInspector.format(description) }] };
      } catch (e) {
        console.error(`Failed to describe ${path}:`, e);
        return { content: [{ type: "text", text: `Error describing ${path}: ${errorMessage(e)}` }], isError: true };
      }
    }
  );

  server.registerTool(
    "describe_class",
    {
      description: "Find a class by its binary name on the configured class path (directories and jars from CLASS_DECODER_CLASSPATH) and summarize it.",
      inputSchema: {
        className: z.string().describe("Binary class name, e.g. 'com.example.Outer$Inner'"),
      },
    },
    async ({ className }) => {
      try {
        const result = await ClassInspector.decodeClass(className);
        if (!result) {
          return { content: [{ type: "text", text: `Class ${className} not found on the class path.` }] };
        }
        const description = ClassInspector.describe(result.classFile, result.source);
        return { content: [{ type: "text", text: ClassInspector.format(description) }] };
      } catch (e) {
        console.error(`Failed to describe ${className}:`, e);
        return { content: [{ type: "text", text: `Error describing ${className}: ${errorMessage(e)}` }], isError: true };
      }
    }
  );

  return server;
}
