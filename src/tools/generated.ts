/**
 * Generated MCP Tools from Command Definitions
 */

import type { CallToolRequest, CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { COMMAND_DEFINITIONS } from '../commands/index.js';
import { generateMcpTool, generateMcpHandler, McpArgs } from '../commands/generators.js';
import type { ServiceContext } from '../commands/types.js';

export class GeneratedToolHandlers {
  private handlers: Map<string, (args: McpArgs) => Promise<CallToolResult>>;

  constructor(private readonly context: ServiceContext) {
    this.handlers = new Map();

    for (const def of COMMAND_DEFINITIONS) {
      this.handlers.set(def.mcpName, generateMcpHandler(def, this.context));
    }
  }

  /**
   * Handle tool calls
   */
  async handleToolCall(request: Pick<CallToolRequest, 'params'>): Promise<CallToolResult> {
    const { name, arguments: args } = request.params;

    const handler = this.handlers.get(name);
    if (!handler) {
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: `Unknown tool: ${name}`,
              errorCode: 'NOT_FOUND',
            }, null, 2),
          },
        ],
        isError: true,
      };
    }

    return handler(args ?? {});
  }
}

// Export generated tools
export const tools: Tool[] = COMMAND_DEFINITIONS.map(def => generateMcpTool(def));

// Export tools by name for reference
export const toolsByName: Record<string, Tool> = {};
for (const tool of tools) {
  toolsByName[tool.name] = tool;
}
