/**
 * @module tools
 * MCP tool definitions and handlers for a Switchboard session.
 *
 * Each tool maps to one dispatcher operation on the server's in-process
 * session and answers with the session snapshot as JSON text.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ACTION_KEYS, resolveAction, snapshotSession } from '@switchboard/core';
import type { Session } from '@switchboard/core';

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  {
    name: 'select_action',
    description:
      'Select the action the next dispatch will run. Does not change the light.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        action: {
          type: 'string',
          enum: [...ACTION_KEYS],
          description: 'Action key: "on" (TurnOn) or "off" (TurnOff)',
        },
      },
      required: ['action'],
    },
  },
  {
    name: 'dispatch',
    description:
      'Run the selected action against the light and record it in history ' +
      '(capacity 10 by default; the oldest entry is dropped when full).',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'undo_last',
    description: 'Remove the most recent history entry and revert its effect.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'get_state',
    description: 'Get the light state, the selected action and the history, oldest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'clear_history',
    description: 'Drop every history entry without reverting anything.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

// Only the schema's enum keys; no display-name aliases.
const ACTION_KEY_SET: ReadonlySet<string> = new Set(ACTION_KEYS);

type ContentItem = { type: 'text'; text: string };
export type ToolResult = { content: ContentItem[]; isError?: boolean };

/**
 * Handle a tool call against `session`.
 * Dispatcher errors and bad arguments come back as error results, not throws.
 */
export function handleToolCall(
  session: Session,
  toolName: string,
  args: Record<string, unknown>,
): ToolResult {
  const { dispatcher } = session;
  try {
    switch (toolName) {
      case 'select_action': {
        const key = args.action;
        const action =
          typeof key === 'string' && ACTION_KEY_SET.has(key) ? resolveAction(key) : undefined;
        if (!action) {
          return errorResult(`action must be one of: ${ACTION_KEYS.join(', ')}`);
        }
        dispatcher.setAction(action);
        return jsonResult(snapshotSession(session));
      }

      case 'dispatch':
        dispatcher.dispatch();
        return jsonResult(snapshotSession(session));

      case 'undo_last': {
        const undone = dispatcher.undoLast();
        return jsonResult({ undone: undone.name, ...snapshotSession(session) });
      }

      case 'get_state':
        return jsonResult(snapshotSession(session));

      case 'clear_history':
        dispatcher.clearHistory();
        return jsonResult(snapshotSession(session));

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    return errorResult(e instanceof Error ? e.message : String(e));
  }
}

// ── Response formatters ────────────────────────────────────────

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
