/**
 * Reader for channel exports used by offline runs.
 *
 * Accepts an array of messages or `{ "messages": [...] }`. Each message has
 * `ts`, optional `text` and `thread_ts`, and optional nested `replies`.
 * Nested replies belong to their parent's thread, and a parent with replies
 * becomes a thread root.
 */

import * as fs from 'fs';
import type { SchemaObject } from 'ajv';
import type { RawMessage } from '../../release_types';
import { compileSchema, formatSchemaErrors } from '../../schemas';

export type ExportedMessage = {
  ts: string | number;
  text?: string;
  thread_ts?: string | number;
  replies?: ExportedMessage[];
};

export type MessageExport = ExportedMessage[] | { messages: ExportedMessage[] };

const TIMESTAMP: SchemaObject = {
  oneOf: [
    { type: 'string', pattern: '^\\d+(\\.\\d+)?$' },
    { type: 'number', minimum: 0 },
  ],
};

const MESSAGE_EXPORT_SCHEMA: SchemaObject = {
  definitions: {
    message: {
      type: 'object',
      required: ['ts'],
      properties: {
        ts: TIMESTAMP,
        text: { type: 'string' },
        thread_ts: TIMESTAMP,
        replies: { type: 'array', items: { $ref: '#/definitions/message' } },
      },
    },
    messages: { type: 'array', items: { $ref: '#/definitions/message' } },
  },
  oneOf: [
    { $ref: '#/definitions/messages' },
    {
      type: 'object',
      required: ['messages'],
      properties: { messages: { $ref: '#/definitions/messages' } },
    },
  ],
};

const validateExport = compileSchema<MessageExport>(MESSAGE_EXPORT_SCHEMA);

export class MessageExportError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'MessageExportError';
    Object.setPrototypeOf(this, MessageExportError.prototype);
  }
}

function toSeconds(ts: string | number): number {
  return typeof ts === 'number' ? ts : Number.parseFloat(ts);
}

function toRawMessages(item: ExportedMessage, parentTs?: number): RawMessage[] {
  const ts = toSeconds(item.ts);
  const message: RawMessage = { id: String(item.ts), text: item.text ?? '', ts };

  if (parentTs !== undefined) {
    message.threadTs = parentTs;
  } else if (item.thread_ts !== undefined) {
    message.threadTs = toSeconds(item.thread_ts);
  } else if (item.replies && item.replies.length > 0) {
    message.threadTs = ts;
  }

  const replies = (item.replies ?? []).flatMap((reply) => toRawMessages(reply, message.threadTs ?? ts));
  return [message, ...replies];
}

/**
 * Flattens a validated export into messages, oldest first.
 * @throws MessageExportError when the data does not match the export format
 */
export function readMessageExport(data: unknown): RawMessage[] {
  if (!validateExport(data)) {
    throw new MessageExportError('Invalid message export', formatSchemaErrors(validateExport.errors));
  }

  const items = Array.isArray(data) ? data : data.messages;
  return items
    .flatMap((item) => toRawMessages(item))
    .sort((a, b) => a.ts - b.ts);
}

export function loadMessageExportFile(filePath: string): RawMessage[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MessageExportError(`Cannot read message export ${filePath}`, [reason]);
  }
  return readMessageExport(parsed);
}
