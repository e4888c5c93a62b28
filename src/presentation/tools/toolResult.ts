import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isOrchestrationError } from '../../core/errors/OrchestrationError.js';

export function textResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * Tool failure carrying the error kind, e.g. `JobNotFound (11): Job not found: abc`
 */
export function errorResult(action: string, error: unknown): CallToolResult {
  const detail = isOrchestrationError(error)
    ? `${error.kind} (${error.code}): ${error.message}`
    : error instanceof Error
      ? error.message
      : String(error);

  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: `Error ${action}: ${detail}`,
      },
    ],
  };
}

export function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}
