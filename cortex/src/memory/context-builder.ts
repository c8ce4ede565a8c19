/**
 * Context Builder - assembles the memory block for the next model call
 *
 * Sections, in order:
 *   ## Long-Term Memory:                  top facts for the query
 *   ## Recent Conversation Summaries:     newest summaries first
 *   ## Relevant Earlier Conversation:     best older summary for the query
 *
 * Resident working-memory turns are sent verbatim by the caller, so any
 * item repeating one of them is left out: a line containing a resident turn
 * of at least `echoMinChars` characters, or an item whose text equals a
 * shorter one. When the block is over budget, whole sections are dropped
 * from the end.
 */

import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { LongTermMemory } from './long-term.js';
import { SummarizationAgent } from './summarization.js';
import { ScoredMemoryEntry, ScoredSummary, Summary } from './types.js';
import { WorkingMemory, estimateTextTokens } from './working-memory.js';

const log = createLogger('Memory');

export const LONG_TERM_HEADER = '## Long-Term Memory:';
export const RECENT_SUMMARIES_HEADER = '## Recent Conversation Summaries:';
export const RELEVANT_SUMMARY_HEADER = '## Relevant Earlier Conversation:';

export interface ContextBuilderOptions {
  recentSummaryCount?: number;
  relevantSummaryMinSimilarity?: number;
  longTermLimit?: number;
  longTermMinSimilarity?: number;
  defaultTokenBudget?: number;
  /** Resident turns shorter than this only match items with the same text */
  echoMinChars?: number;
  estimateTokens?: (text: string) => number;
}

export interface BuildOptions {
  maxTokens?: number;
}

interface Section {
  header: string;
  lines: string[];
}

interface Item {
  text: string;
  line: string;
}

function formatDate(iso: string): string {
  return iso.substring(0, 10);
}

function formatSummary(summary: Summary): string {
  const line = `- [${formatDate(summary.createdAt)}] ${summary.text}`;
  if (summary.keyFacts.length === 0) return line;
  return `${line}\n  Facts: ${summary.keyFacts.join(', ')}`;
}

function formatRelevant({ summary, similarity }: ScoredSummary): string {
  const relevance = Math.round(Math.min(1, Math.max(0, similarity)) * 100);
  return `- [${formatDate(summary.createdAt)}] ${summary.text} (relevance: ${relevance}%)`;
}

function formatEntry({ entry }: ScoredMemoryEntry): string {
  return `- [${entry.kind}] ${entry.content}`;
}

function renderSection(section: Section): string {
  return [section.header, ...section.lines].join('\n');
}

function renderSections(sections: readonly Section[]): string {
  return sections.map(renderSection).join('\n\n');
}

export class ContextBuilder {
  private readonly recentSummaryCount: number;
  private readonly relevantSummaryMinSimilarity: number;
  private readonly longTermLimit: number;
  private readonly longTermMinSimilarity: number;
  private readonly defaultTokenBudget: number;
  private readonly echoMinChars: number;
  private readonly estimate: (text: string) => number;

  constructor(
    private readonly workingMemory: WorkingMemory,
    private readonly summarization: SummarizationAgent,
    private readonly longTerm: LongTermMemory,
    options: ContextBuilderOptions = {}
  ) {
    this.recentSummaryCount = options.recentSummaryCount ?? 3;
    this.relevantSummaryMinSimilarity = options.relevantSummaryMinSimilarity ?? 0.6;
    this.longTermLimit = options.longTermLimit ?? 5;
    this.longTermMinSimilarity = options.longTermMinSimilarity ?? 0.4;
    this.defaultTokenBudget = options.defaultTokenBudget ?? 1500;
    this.echoMinChars = options.echoMinChars ?? 24;
    this.estimate = options.estimateTokens ?? estimateTextTokens;
  }

  /**
   * Build the memory block for `query`. Returns '' when there is nothing
   * to add or nothing fits.
   */
  async build(query: string, options: BuildOptions = {}): Promise<string> {
    const budget = options.maxTokens ?? this.defaultTokenBudget;
    if (budget <= 0) return '';

    const resident = this.workingMemory.snapshot().map(turn => turn.content.trim());
    const longEchoes = resident.filter(content => content.length >= this.echoMinChars);
    const shortEchoes = new Set(resident.filter(content => content && content.length < this.echoMinChars));
    const isEcho = (item: Item): boolean =>
      shortEchoes.has(item.text.trim()) || longEchoes.some(content => item.line.includes(content));

    const recent = this.summarization.getRecentSummaries(this.recentSummaryCount);
    const queryEmbedding = await this.longTerm.embed(query);

    let relevant: ScoredSummary | undefined;
    try {
      const [best] = this.summarization.searchSimilarSummaries(
        queryEmbedding,
        1,
        this.relevantSummaryMinSimilarity
      );
      if (best && !recent.some(summary => summary.id === best.summary.id)) {
        relevant = best;
      }
    } catch (error) {
      log.debug(`Skipping relevant summary lookup: ${errorMessage(error)}`);
    }

    const entries = this.longTermLimit > 0
      ? await this.longTerm.search(queryEmbedding, this.longTermLimit, this.longTermMinSimilarity)
      : [];

    const candidates: Array<{ header: string; items: Item[] }> = [
      {
        header: LONG_TERM_HEADER,
        items: entries.map(result => ({ text: result.entry.content, line: formatEntry(result) })),
      },
      {
        header: RECENT_SUMMARIES_HEADER,
        items: recent.map(summary => ({ text: summary.text, line: formatSummary(summary) })),
      },
      {
        header: RELEVANT_SUMMARY_HEADER,
        items: relevant ? [{ text: relevant.summary.text, line: formatRelevant(relevant) }] : [],
      },
    ];

    const sections: Section[] = candidates
      .map(({ header, items }) => ({
        header,
        lines: items.filter(item => !isEcho(item)).map(item => item.line),
      }))
      .filter(section => section.lines.length > 0);

    let output = renderSections(sections);
    while (sections.length > 0 && this.estimate(output) > budget) {
      const dropped = sections.pop();
      log.debug(`Context over budget, dropping section ${dropped?.header ?? ''}`);
      output = renderSections(sections);
    }

    return output;
  }
}
