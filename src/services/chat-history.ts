import { randomUUID } from 'node:crypto';
import { ModelUnavailableError, ValidationError } from '../core/errors.js';
import type {
    ChatTurnPayload,
    Entity,
    ListEnvelope,
    ReadEnvelope,
} from '../types/persistence.js';
import type { ScoredVectorRecord, VectorMetadata } from '../types/vector.js';
import { logThought } from '../utils/logger.js';
import type { Embedder } from './embedding-service.js';
import type { PrimaryBackupRepository } from './repositories/primary-backup-repository.js';
import { isRecord, type PayloadParser } from './repositories/entity-codec.js';
import type { VectorStore } from './vector-store.js';

const CHARS_PER_TOKEN = 4;
const HISTORY_SHARE = 0.8;
const RECENT_TURNS_SCAN = 20;
const MEMORY_RECALL_K = 5;
const INDEXED_TEXT_LIMIT = 500;
const SESSION_SCAN_LIMIT = 200;
const CLEAR_BATCH = 100;
const SUMMARY_TOPICS = 3;
const SUMMARY_SNIPPET_CHARS = 40;

const ROLES: ReadonlySet<string> = new Set(['user', 'assistant', 'system']);

export const parseChatTurnPayload: PayloadParser<ChatTurnPayload> = (raw) => {
    if (!isRecord(raw)) {
        throw new ValidationError('Chat turn payload must be an object.');
    }
    const { role, content, modelId, intent, category } = raw;
    if (typeof role !== 'string' || !ROLES.has(role) || typeof content !== 'string') {
        throw new ValidationError('Chat turn payload needs a role and string content.');
    }
    const payload: ChatTurnPayload = { role: role === 'user' || role === 'assistant' ? role : 'system', content };
    if (typeof modelId === 'string') payload.modelId = modelId;
    if (typeof intent === 'string') payload.intent = intent;
    if (typeof category === 'string') payload.category = category;
    return payload;
};

export interface ContextEnvelope {
    text: string;
    /** True when the session's turns were read from the backup tier. */
    degraded: boolean;
}

/** A user prompt and the assistant reply that followed it, if any. */
export interface Interaction {
    prompt: string;
    reply: string | null;
    modelId: string | null;
    at: string;
}

export interface InteractionListing {
    interactions: Interaction[];
    degraded: boolean;
}

export interface MemorySearchResult {
    memories: Entity<ChatTurnPayload>[];
    degraded: boolean;
}

function snippet(text: string): string {
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length > SUMMARY_SNIPPET_CHARS ? `${flat.slice(0, SUMMARY_SNIPPET_CHARS - 3).trimEnd()}...` : flat;
}

/** One line standing in for turns that fell out of the history budget (newest first). */
export function summarizeEarlierTurns(turns: readonly Entity<ChatTurnPayload>[]): string {
    const head = `${turns.length} earlier turn${turns.length === 1 ? '' : 's'} not shown`;
    const topics = turns
        .filter((turn) => turn.payload.role === 'user')
        .slice(0, SUMMARY_TOPICS)
        .reverse()
        .map((turn) => `"${snippet(turn.payload.content)}"`);
    return topics.length > 0 ? `${head}; the user asked about ${topics.join(', ')}.` : `${head}.`;
}

function memoryLine(text: string, category: string | undefined): string {
    return category ? `- [${category}] ${text}` : `- ${text}`;
}

export interface ChatHistoryOptions {
    repository: PrimaryBackupRepository<ChatTurnPayload>;
    vectorStore?: VectorStore;
    embedder?: Embedder;
    now?: () => number;
    idFactory?: () => string;
}

/**
 * Conversation turns and saved memories on top of the primary-backup repository,
 * with semantic recall through the vector store when an embedder is configured.
 *
 * Writes for one session are applied strictly in call order; different
 * sessions write in parallel.
 */
export class ChatHistoryService {
    readonly #repository: PrimaryBackupRepository<ChatTurnPayload>;
    readonly #vectorStore: VectorStore | null;
    readonly #embedder: Embedder | null;
    readonly #now: () => number;
    readonly #idFactory: () => string;
    readonly #queues: Map<string, Promise<void>> = new Map();

    constructor(options: ChatHistoryOptions) {
        this.#repository = options.repository;
        this.#vectorStore = options.vectorStore ?? null;
        this.#embedder = options.embedder ?? null;
        this.#now = options.now ?? (() => Date.now());
        this.#idFactory = options.idFactory ?? randomUUID;
    }

    get semanticRecallEnabled(): boolean {
        return this.#vectorStore !== null && this.#embedder !== null;
    }

    async appendTurn(
        sessionId: string,
        role: ChatTurnPayload['role'],
        content: string,
        metadata: { modelId?: string; intent?: string } = {},
        signal?: AbortSignal,
    ): Promise<Entity<ChatTurnPayload>> {
        if (!sessionId.trim()) {
            throw new ValidationError('sessionId must be a non-empty string.');
        }
        if (!content.trim()) {
            throw new ValidationError('A chat turn needs non-empty content.');
        }

        const payload: ChatTurnPayload = { role, content, ...metadata };
        return this.write(
            {
                id: this.#idFactory(),
                ownerSessionId: sessionId,
                kind: 'chat_turn',
                payload,
                createdAt: new Date(this.#now()).toISOString(),
                syncState: 'synced',
            },
            signal,
        );
    }

    /** Stores a user-provided fact as a `memory` entity of the session. */
    async saveMemory(
        sessionId: string,
        category: string,
        content: string,
        signal?: AbortSignal,
    ): Promise<Entity<ChatTurnPayload>> {
        if (!sessionId.trim()) {
            throw new ValidationError('sessionId must be a non-empty string.');
        }
        const normalizedCategory = category.trim().toLowerCase();
        if (!normalizedCategory) {
            throw new ValidationError('A memory needs a category.');
        }
        if (!content.trim()) {
            throw new ValidationError('A memory needs non-empty content.');
        }

        return this.write(
            {
                id: this.#idFactory(),
                ownerSessionId: sessionId,
                kind: 'memory',
                payload: { role: 'system', content: content.trim(), category: normalizedCategory },
                createdAt: new Date(this.#now()).toISOString(),
                syncState: 'synced',
            },
            signal,
        );
    }

    /**
     * Saved memories of a session whose content or category contains `query`
     * (case-insensitive), most recent first. An empty query lists them all.
     */
    async searchMemory(sessionId: string, query = '', limit = 10, signal?: AbortSignal): Promise<MemorySearchResult> {
        const needle = query.trim().toLowerCase();
        const { entities, degraded } = await this.recentTurns(sessionId, SESSION_SCAN_LIMIT, signal);
        const memories = entities
            .filter((entity) => entity.kind === 'memory')
            .filter(
                (entity) =>
                    entity.payload.content.toLowerCase().includes(needle) ||
                    (entity.payload.category ?? '').includes(needle),
            )
            .slice(0, Math.max(1, Math.floor(limit)));
        return { memories, degraded };
    }

    /** The last `limit` prompt/reply pairs of a session, oldest first. */
    async recentInteractions(sessionId: string, limit = 5, signal?: AbortSignal): Promise<InteractionListing> {
        const count = Math.max(1, Math.floor(limit));
        const { entities, degraded } = await this.recentTurns(sessionId, count * 4, signal);

        const interactions: Interaction[] = [];
        for (const entity of [...entities].reverse()) {
            if (entity.kind !== 'chat_turn') continue;
            const { role, content, modelId } = entity.payload;
            if (role === 'user') {
                interactions.push({ prompt: content, reply: null, modelId: null, at: entity.createdAt });
                continue;
            }
            const open = interactions.at(-1);
            if (role === 'assistant' && open && open.reply === null) {
                open.reply = content;
                open.modelId = modelId ?? null;
            }
        }
        return { interactions: interactions.slice(-count), degraded };
    }

    /**
     * Deletes every turn and memory of a session from both tiers, then drops their
     * vector entries. Runs in the session's write order. Returns entities removed.
     */
    async clearSession(sessionId: string, signal?: AbortSignal): Promise<number> {
        if (!sessionId.trim()) {
            throw new ValidationError('sessionId must be a non-empty string.');
        }

        const removed = await this.#enqueue(sessionId, async () => {
            const seen = new Set<string>();
            const deleted: string[] = [];
            for (;;) {
                const { entities } = await this.recentTurns(sessionId, CLEAR_BATCH, signal);
                const fresh = entities.filter((entity) => !seen.has(entity.id));
                if (fresh.length === 0) break;
                for (const entity of fresh) {
                    seen.add(entity.id);
                    if (await this.#repository.delete(entity.id, signal)) {
                        deleted.push(entity.id);
                    }
                }
            }
            return deleted;
        });

        if (this.#vectorStore && removed.length > 0) {
            try {
                await this.#vectorStore.remove(removed);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                void logThought(`[ChatHistory] Vector entries for cleared session '${sessionId}' kept: ${message}`);
            }
        }
        void logThought(`[ChatHistory] Cleared ${removed.length} entities from session '${sessionId}'.`);
        return removed.length;
    }

    /** Persist a prepared entity in its session's write order, then index it for recall. */
    async write(entity: Entity<ChatTurnPayload>, signal?: AbortSignal): Promise<Entity<ChatTurnPayload>> {
        const saved = await this.#enqueue(entity.ownerSessionId, () => this.#repository.save(entity, signal));
        await this.#index(saved);
        return saved;
    }

    read(id: string, signal?: AbortSignal): Promise<ReadEnvelope<ChatTurnPayload>> {
        return this.#repository.findById(id, signal);
    }

    /** Most recent first. */
    recentTurns(sessionId: string, limit: number, signal?: AbortSignal): Promise<ListEnvelope<ChatTurnPayload>> {
        return this.#repository.listBySession(sessionId, limit, signal);
    }

    /**
     * Prompt context within `maxTokens`: 80% for the most recent turns (oldest first)
     * and a one-line summary of older ones when it fits, 20% for the session's saved
     * memories and then recalled ones not already among those turns.
     */
    async buildContext(sessionId: string, query: string, maxTokens = 500, signal?: AbortSignal): Promise<ContextEnvelope> {
        const budgetChars = Math.max(0, Math.floor(maxTokens)) * CHARS_PER_TOKEN;
        const historyBudget = Math.floor(budgetChars * HISTORY_SHARE);
        const memoryBudget = budgetChars - historyBudget;

        const { entities, degraded } = await this.recentTurns(sessionId, RECENT_TURNS_SCAN, signal);
        const turns = entities.filter((entity) => entity.kind === 'chat_turn');
        const historyLines: string[] = [];
        const includedIds = new Set<string>();
        let used = 0;
        for (const entity of turns) {
            const line = `${entity.payload.role}: ${entity.payload.content}`;
            if (used + line.length + 1 > historyBudget) break;
            historyLines.unshift(line);
            includedIds.add(entity.id);
            used += line.length + 1;
        }

        const omitted = turns.slice(historyLines.length);
        let summary = omitted.length > 0 ? summarizeEarlierTurns(omitted) : '';
        if (summary.length + 1 > historyBudget - used) {
            summary = '';
        }

        const memoryLines: string[] = [];
        let memoryUsed = 0;
        const addMemory = (id: string, line: string): boolean => {
            if (includedIds.has(id)) return true;
            if (memoryUsed + line.length + 1 > memoryBudget) return false;
            memoryLines.push(line);
            includedIds.add(id);
            memoryUsed += line.length + 1;
            return true;
        };

        for (const memory of entities.filter((entity) => entity.kind === 'memory')) {
            if (!addMemory(memory.id, memoryLine(memory.payload.content, memory.payload.category))) break;
        }

        if (this.semanticRecallEnabled && memoryBudget > 0) {
            try {
                for (const { record } of await this.semanticSearch(query, MEMORY_RECALL_K, signal)) {
                    const { text, category } = record.metadata;
                    if (typeof text !== 'string') continue;
                    if (!addMemory(record.id, memoryLine(text, typeof category === 'string' ? category : undefined))) break;
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                void logThought(`[ChatHistory] Memory recall skipped for session '${sessionId}': ${message}`);
            }
        }

        const sections: string[] = [];
        if (memoryLines.length > 0) {
            sections.push(`Relevant memories:\n${memoryLines.join('\n')}`);
        }
        if (summary) {
            sections.push(`Earlier conversation:\n${summary}`);
        }
        if (historyLines.length > 0) {
            sections.push(`Recent conversation:\n${historyLines.join('\n')}`);
        }
        return { text: sections.join('\n\n'), degraded };
    }

    async semanticSearch(queryText: string, k?: number, signal?: AbortSignal): Promise<ScoredVectorRecord[]> {
        if (!this.#vectorStore || !this.#embedder) {
            throw new ModelUnavailableError('Semantic search needs an embedding provider.');
        }
        if (!queryText.trim()) {
            throw new ValidationError('Search text must be a non-empty string.');
        }
        const vector = await this.#embedder.embed(queryText, signal);
        return this.#vectorStore.query(vector, k);
    }

    /** Resolves once every queued write has settled. */
    async drain(): Promise<void> {
        await Promise.all([...this.#queues.values()]);
    }

    #enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.#queues.get(key) ?? Promise.resolve();
        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        this.#queues.set(key, tail);
        void tail.then(() => {
            if (this.#queues.get(key) === tail) {
                this.#queues.delete(key);
            }
        });
        return run;
    }

    async #index(entity: Entity<ChatTurnPayload>): Promise<void> {
        if (!this.#vectorStore || !this.#embedder) return;
        try {
            const vector = await this.#embedder.embed(entity.payload.content);
            const metadata: VectorMetadata = {
                sessionId: entity.ownerSessionId,
                role: entity.payload.role,
                kind: entity.kind,
                text: entity.payload.content.slice(0, INDEXED_TEXT_LIMIT),
            };
            if (entity.payload.category) metadata.category = entity.payload.category;
            await this.#vectorStore.upsert(entity.id, vector, metadata);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            void logThought(`[ChatHistory] Indexing turn '${entity.id}' failed: ${message}`);
        }
    }
}
