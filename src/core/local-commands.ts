import type { Interaction } from '../services/chat-history.js';
import type { ChatTurnPayload, Entity } from '../types/persistence.js';
import type { OrchestratorStatus } from './orchestrator.js';

/** Requests the assistant answers itself instead of sending them to a model. */
export type LocalCommand =
  | { name: 'help' }
  | { name: 'status' }
  | { name: 'clear' }
  | { name: 'remember'; category: string; content: string }
  | { name: 'memory'; query: string };

export type LocalCommandName = LocalCommand['name'];

const DEFAULT_MEMORY_CATEGORY = 'general';
const PREVIEW_CHARS = 50;

export const HELP_TEXT = [
  'Commands:',
  '  /remember <category>: <fact>  save a fact to this session\'s memory',
  '  /memory [text]                list saved memories, or search them',
  '  /clear                        delete this session\'s turns and memories',
  '  /status                       resources, breakers and storage health',
  '  /help                         this list',
].join('\n');

/**
 * Recognises a local command. A leading `/` always marks one; without it only a
 * bare command word, or `remember <category>: <fact>`, counts, so ordinary
 * questions that happen to start with "clear" or "memory" still reach a model.
 */
export function parseLocalCommand(query: string): LocalCommand | null {
  const trimmed = query.trim();
  const slashed = trimmed.startsWith('/');
  const match = /^(\w+)(?:\s+([\s\S]*))?$/.exec(slashed ? trimmed.slice(1).trimStart() : trimmed);
  if (!match) return null;

  const word = (match[1] ?? '').toLowerCase();
  const args = (match[2] ?? '').trim();
  const bare = slashed || args.length === 0;

  switch (word) {
    case 'help':
      return bare ? { name: 'help' } : null;
    case 'status':
      return bare ? { name: 'status' } : null;
    case 'clear':
      return bare ? { name: 'clear' } : null;
    case 'memory':
    case 'recall':
      return bare ? { name: 'memory', query: args } : null;
    case 'remember': {
      const fact = /^([\w-]+)\s*:\s*([\s\S]+)$/.exec(args);
      if (fact) {
        return { name: 'remember', category: fact[1] ?? DEFAULT_MEMORY_CATEGORY, content: (fact[2] ?? '').trim() };
      }
      if (!slashed) return null;
      return args ? { name: 'remember', category: DEFAULT_MEMORY_CATEGORY, content: args } : { name: 'help' };
    }
    default:
      return null;
  }
}

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}...` : flat;
}

function memoryLines(memories: readonly Entity<ChatTurnPayload>[]): string {
  return memories.map((memory) => `- ${memory.payload.category ?? DEFAULT_MEMORY_CATEGORY}: ${memory.payload.content}`).join('\n');
}

export function formatMemorySearch(query: string, memories: readonly Entity<ChatTurnPayload>[]): string {
  if (memories.length === 0) {
    return `No saved memories match '${query}'.`;
  }
  return `Memories matching '${query}':\n${memoryLines(memories)}`;
}

/** Listing for a bare `/memory`: saved facts, then the latest exchanges. */
export function formatMemoryOverview(
  memories: readonly Entity<ChatTurnPayload>[],
  interactions: readonly Interaction[],
): string {
  const sections: string[] = [];
  if (memories.length > 0) {
    sections.push(`Saved memories:\n${memoryLines(memories)}`);
  }
  if (interactions.length > 0) {
    const lines = interactions.map((interaction) =>
      interaction.reply === null
        ? `- You: ${preview(interaction.prompt)}`
        : `- You: ${preview(interaction.prompt)}\n  Me: ${preview(interaction.reply)}`,
    );
    sections.push(`Recent conversation:\n${lines.join('\n')}`);
  }
  return sections.length > 0 ? sections.join('\n\n') : 'No saved memories yet.';
}

export function formatStatus(status: OrchestratorStatus): string {
  const { resources, breakers, vector, persistence } = status;
  const openBreakers = breakers.filter((breaker) => breaker.state !== 'closed').map((breaker) => breaker.dependencyName);
  const pending = persistence.pendingPrimary === null ? 'unknown' : String(persistence.pendingPrimary);
  return [
    `Resources: ${resources.bucket} (CPU ${Math.round(resources.cpuPercent)}%, memory ${Math.round(resources.memPercent)}%, ${resources.connectivity ? 'online' : 'offline'}${resources.stale ? ', stale' : ''}).`,
    `Breakers not closed: ${openBreakers.length > 0 ? openBreakers.join(', ') : 'none'}.`,
    `Vector backend: ${vector.backendOrigin} (${vector.records} records).`,
    `Storage: ${persistence.primary} primary, ${persistence.backup} backup, ${pending} awaiting reconciliation.`,
  ].join('\n');
}
