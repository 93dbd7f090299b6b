import { inspect } from 'node:util';
import { redactSecrets } from '../security/redact';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: number;
  time: string;
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

// Nest boot chatter; errors and warnings from these contexts are still kept.
const IGNORED_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
]);

const MAX_MESSAGE_LENGTH = 10_000;

function normalizeMessage(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (typeof input === 'number' || typeof input === 'boolean' || typeof input === 'bigint') {
    return String(input);
  }
  return inspect(input, { depth: 4, maxArrayLength: 50 });
}

/** Fixed-size ring of recent log lines, newest last. Messages are redacted on the way in. */
export class ServerLogStore {
  private readonly ring: Array<ServerLogEntry | null>;
  private nextId = 1;
  private writeIndex = 0;
  private count = 0;

  constructor(private readonly capacity = 2_000) {
    this.ring = Array.from({ length: capacity }, () => null);
  }

  add(params: { level: ServerLogLevel; message: unknown; stack?: unknown; context?: unknown }): void {
    const msg = normalizeMessage(params.message).trim();
    const stack = normalizeMessage(params.stack).trim();
    const combined = stack ? (msg ? `${msg}\n${stack}` : stack) : msg;
    if (!combined) return;

    const context = typeof params.context === 'string' && params.context.trim() ? params.context.trim() : null;
    if (context && IGNORED_CONTEXTS.has(context) && params.level !== 'error' && params.level !== 'warn') {
      return;
    }

    const message = redactSecrets(combined);
    this.ring[this.writeIndex] = {
      id: this.nextId++,
      time: new Date().toISOString(),
      level: params.level,
      message: message.length > MAX_MESSAGE_LENGTH ? `${message.slice(0, MAX_MESSAGE_LENGTH)}...` : message,
      context,
    };
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.count = Math.min(this.capacity, this.count + 1);
  }

  list(params: { afterId?: number; limit?: number } = {}): { logs: ServerLogEntry[]; latestId: number } {
    const latestId = this.nextId - 1;
    const limit = Math.max(1, Math.min(this.capacity, params.limit ?? 200));
    const afterId = params.afterId ?? 0;

    const oldestIndex = this.count === this.capacity ? this.writeIndex : 0;
    const ordered: ServerLogEntry[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const entry = this.ring[(oldestIndex + i) % this.capacity];
      if (entry && entry.id > afterId) ordered.push(entry);
    }
    return { logs: ordered.slice(-limit), latestId };
  }
}

/** Process-wide buffer fed by BufferedLogger and read by the logs endpoint. */
export const serverLogs = new ServerLogStore();
