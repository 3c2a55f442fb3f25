import { z } from 'zod';
import type { ToolInvocation, Turn, TurnRole, TurnSource } from '../types.js';
import { isRecord, parseTimestamp, toToolArgs } from '../utils.js';

// Raw schemas matching the JSONL structure written by Claude Code
const textBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    id: z.string().optional(),
    name: z.string().optional(),
    input: z.unknown().optional(),
    tool_use_id: z.string().optional(),
    content: z.union([z.string(), z.array(textBlockSchema)]).optional(),
  })
  .passthrough();

type ContentBlock = z.infer<typeof contentBlockSchema>;

const claudeEntrySchema = z
  .object({
    type: z.enum(['user', 'assistant']),
    timestamp: z.string().optional(),
    isMeta: z.boolean().optional(),
    message: z
      .object({
        role: z.enum(['user', 'assistant']),
        content: z.union([z.string(), z.array(contentBlockSchema)]),
      })
      .passthrough(),
  })
  .passthrough();

type ClaudeEntry = z.infer<typeof claudeEntrySchema>;

// Minimal record shape: { role, text, timestamp, toolName?, toolArgs? }
const flatRecordSchema = z
  .object({
    role: z.enum(['user', 'assistant', 'tool']),
    text: z.string().optional(),
    content: z.string().optional(),
    timestamp: z.union([z.string(), z.number()]).optional(),
    toolName: z.string().optional(),
    toolArgs: z.unknown().optional(),
  })
  .passthrough()
  .refine((r) => r.text !== undefined || r.content !== undefined || r.toolName !== undefined, {
    message: 'record has no text, content or toolName',
  });

type FlatRecord = z.infer<typeof flatRecordSchema>;

export interface LineContext {
  file: string;
  line: number;
  sessionId: string;
  /** tool_use id -> invocation, shared across the lines of one file */
  toolUses: Map<string, ToolInvocation>;
}

export type LineResult =
  | { kind: 'turn'; turn: Turn }
  | { kind: 'ignored' }
  | { kind: 'skipped'; reason: string };

function createTurn(
  role: TurnRole,
  text: string,
  timestamp: string | undefined,
  context: LineContext,
  toolCalls: ToolInvocation[] = [],
  tool?: ToolInvocation,
): Turn {
  const source: TurnSource = Object.freeze({ file: context.file, line: context.line });
  return Object.freeze({
    role,
    timestamp,
    text,
    sessionId: context.sessionId,
    source,
    toolCalls: Object.freeze(toolCalls),
    ...(tool ? { toolName: tool.name, toolArgs: tool.args } : {}),
  });
}

/**
 * Extract text from a tool_result content which can be a string or an array of text blocks
 */
function extractResultText(content: ContentBlock['content']): string {
  if (!content) return '';
  if (typeof content === 'string') return content;
  return content
    .filter((block) => block.type === 'text' && block.text)
    .map((block) => block.text ?? '')
    .join('\n');
}

function extractText(blocks: ContentBlock[]): string {
  return blocks
    .filter((b) => b.type === 'text' && b.text)
    .map((b) => b.text ?? '')
    .join('\n');
}

function extractToolCalls(blocks: ContentBlock[]): ToolInvocation[] {
  const calls: ToolInvocation[] = [];
  for (const b of blocks) {
    if (b.type === 'tool_use' && b.name) {
      calls.push({
        ...(b.id ? { id: b.id } : {}),
        name: b.name,
        args: toToolArgs(b.input),
      });
    }
  }
  return calls;
}

function entryToTurn(entry: ClaudeEntry, context: LineContext): LineResult {
  // Injected caveats and command echoes are not something the user typed
  if (entry.isMeta) return { kind: 'ignored' };

  const timestamp = parseTimestamp(entry.timestamp);
  const content = entry.message.content;

  if (entry.message.role === 'assistant') {
    if (typeof content === 'string') {
      return { kind: 'turn', turn: createTurn('assistant', content, timestamp, context) };
    }
    const toolCalls = extractToolCalls(content);
    for (const call of toolCalls) {
      if (call.id) context.toolUses.set(call.id, call);
    }
    return {
      kind: 'turn',
      turn: createTurn('assistant', extractText(content), timestamp, context, toolCalls, toolCalls[0]),
    };
  }

  if (typeof content === 'string') {
    return { kind: 'turn', turn: createTurn('user', content, timestamp, context) };
  }

  const text = extractText(content);
  const results = content.filter((b) => b.type === 'tool_result');

  // A user entry carrying only tool results is the tool talking, not the user
  if (!text && results.length > 0) {
    const first = results[0];
    const resolved = first?.tool_use_id ? context.toolUses.get(first.tool_use_id) : undefined;
    const resultText = results.map((r) => extractResultText(r.content)).join('\n');
    return { kind: 'turn', turn: createTurn('tool', resultText, timestamp, context, [], resolved) };
  }

  return { kind: 'turn', turn: createTurn('user', text, timestamp, context) };
}

function flatRecordToTurn(record: FlatRecord, context: LineContext): LineResult {
  const text = record.text ?? record.content ?? '';
  const timestamp = parseTimestamp(record.timestamp);
  const tool = record.toolName ? { name: record.toolName, args: toToolArgs(record.toolArgs) } : undefined;
  // A flat tool record stands alone: no assistant record carries its call
  const toolCalls = record.role !== 'user' && tool ? [tool] : [];

  return { kind: 'turn', turn: createTurn(record.role, text, timestamp, context, toolCalls, tool) };
}

/**
 * Classify one JSONL line as a turn, an ignorable record, or a malformed line.
 */
export function parseLogLine(line: string, context: LineContext): LineResult {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return { kind: 'skipped', reason: 'invalid JSON' };
  }

  if (!isRecord(value)) {
    return { kind: 'skipped', reason: 'not a JSON object' };
  }

  const type = value['type'];
  if (type === 'user' || type === 'assistant') {
    const parsed = claudeEntrySchema.safeParse(value);
    if (!parsed.success) {
      return { kind: 'skipped', reason: `malformed ${type} entry` };
    }
    return entryToTurn(parsed.data, context);
  }

  if ('role' in value) {
    const parsed = flatRecordSchema.safeParse(value);
    if (!parsed.success) {
      return { kind: 'skipped', reason: 'malformed record' };
    }
    return flatRecordToTurn(parsed.data, context);
  }

  // summary, file-history-snapshot, system, ...
  if (typeof type === 'string') {
    return { kind: 'ignored' };
  }

  return { kind: 'skipped', reason: 'unrecognized record' };
}
