/**
 * In-process stand-ins shared by the memory tests
 */

import { EmbeddingProvider } from '../embedding-service.js';
import { ExtractionError } from '../errors.js';
import { ExtractionSpec, StructuredExtractor, parseExtraction } from '../extraction.js';
import { MemoryDatabase } from '../db.js';
import { MemoryStore } from '../memory-store.js';
import { Summary, Turn, TurnRole } from '../types.js';

/**
 * Embeds known texts to fixed vectors; anything else gets the fallback
 */
export class StubEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];
  readonly failures = new Set<string>();
  private readonly vectors = new Map<string, number[]>();

  constructor(vectors: Record<string, number[]> = {}, private readonly fallback: number[] = [0, 0, 0, 1]) {
    for (const [text, vector] of Object.entries(vectors)) {
      this.vectors.set(text, vector);
    }
  }

  set(text: string, vector: number[]): void {
    this.vectors.set(text, vector);
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failures.has(text)) {
      throw new Error(`embedding failed for "${text}"`);
    }
    return [...(this.vectors.get(text) ?? this.fallback)];
  }
}

export type ScriptedResponse = () => Promise<unknown>;

export const reply = (raw: unknown): ScriptedResponse => () => Promise.resolve(raw);
export const fail = (message: string): ScriptedResponse => () => Promise.reject(new Error(message));
export const hang = (): ScriptedResponse => () => new Promise<unknown>(() => undefined);

/**
 * Replays queued raw outputs per extraction name, validated like real output
 */
export class ScriptedExtractor implements StructuredExtractor {
  readonly calls: Array<{ name: string; turnIds: string[] }> = [];
  private readonly queues = new Map<string, ScriptedResponse[]>();

  enqueue(name: string, ...responses: ScriptedResponse[]): void {
    const queue = this.queues.get(name) ?? [];
    queue.push(...responses);
    this.queues.set(name, queue);
  }

  async extract<T>(spec: ExtractionSpec<T>, turns: readonly Turn[]): Promise<T> {
    this.calls.push({ name: spec.name, turnIds: turns.map(turn => turn.id) });
    const next = this.queues.get(spec.name)?.shift();
    if (!next) {
      throw new ExtractionError(`No scripted ${spec.name} response`);
    }
    return parseExtraction(spec, await next());
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Clock that advances one second per call
 */
export function steppingClock(start = '2024-01-01T00:00:00.000Z'): () => Date {
  let time = Date.parse(start);
  return () => {
    time += 1000;
    return new Date(time);
  };
}

export function makeTurn(id: string, content: string, role: TurnRole = 'user', createdAt = '2024-01-01T00:00:00.000Z'): Turn {
  return { id, role, content, createdAt, importance: 0.5 };
}

export function makeSummary(id: string, text: string, createdAt: string, embedding?: number[], keyFacts: string[] = []): Summary {
  return {
    id,
    spanStartTurnId: `${id}-start`,
    spanEndTurnId: `${id}-end`,
    text,
    keyFacts,
    decisions: [],
    toolsMentioned: [],
    topics: [],
    embedding,
    turnCount: 2,
    tokenSavings: 10,
    createdAt,
  };
}

export async function openStore(agentId = 'agent-a'): Promise<{ db: MemoryDatabase; store: MemoryStore }> {
  const db = new MemoryDatabase(':memory:');
  await db.init();
  return { db, store: new MemoryStore(db, agentId) };
}
