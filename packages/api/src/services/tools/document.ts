import { chunkLabel, type RankedCandidate } from '@ragline/shared';
import type { Tool, ToolInput, ToolOutput } from './types';

/**
 * Document-aware tools. They read only the assembled context (never the
 * whole corpus) and extract structure: table rows, definition lines,
 * section headings. Their output grounds the final answer.
 */

const DEFINITION_LINE = /^\s*([A-Za-z0-9][^:]{1,60}):\s+(.+)$/;
const MARKDOWN_HEADING = /^\s{0,3}#{1,6}\s+(.+?)\s*#*\s*$/m;
const NUMBERED_HEADING = /^\s*((?:\d+\.)+\d*\s+[A-Z][^\n]{2,80})$/m;

export function findTables(contextText: string): string[][] {
  const tables: string[][] = [];
  let current: string[] = [];

  for (const line of contextText.split('\n')) {
    if (line.includes('|') || line.includes('\t')) {
      current.push(line);
    } else if (current.length > 0) {
      tables.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    tables.push(current);
  }
  return tables;
}

export function listDefinitions(contextText: string): Array<{ term: string; definition: string }> {
  const definitions: Array<{ term: string; definition: string }> = [];
  for (const line of contextText.split('\n')) {
    const match = DEFINITION_LINE.exec(line);
    if (match) {
      definitions.push({ term: match[1].trim(), definition: match[2].trim() });
    }
  }
  return definitions;
}

/**
 * Section a chunk belongs to: ingestion metadata first, then the first
 * heading found in its text.
 */
export function sectionOf(candidate: RankedCandidate): string {
  const { chunk } = candidate;
  if (typeof chunk.metadata.section === 'string' && chunk.metadata.section.trim()) {
    return chunk.metadata.section.trim();
  }
  const heading = MARKDOWN_HEADING.exec(chunk.content) ?? NUMBERED_HEADING.exec(chunk.content);
  return heading ? heading[1].trim() : 'Unsectioned';
}

export function citationsBySection(used: RankedCandidate[]): Array<{ section: string; citations: string[] }> {
  const sections = new Map<string, string[]>();
  for (const candidate of used) {
    const section = sectionOf(candidate);
    const snippet = candidate.chunk.content.slice(0, 160).replace(/\n/g, ' ');
    const entry = `[${chunkLabel(candidate.chunk)}] ${snippet}`;
    const list = sections.get(section);
    if (list) {
      list.push(entry);
    } else {
      sections.set(section, [entry]);
    }
  }
  return [...sections.entries()].map(([section, citations]) => ({ section, citations }));
}

export const findTablesTool: Tool = {
  name: 'find_tables',
  description: 'Locate tables in the retrieved passages',
  kind: 'document',
  patterns: [/\btables?\b/i, /\btabular\b/i],
  async run({ context }: ToolInput): Promise<ToolOutput> {
    const tables = findTables(context.text);
    if (tables.length === 0) {
      return { text: 'No tables found in the provided context.', data: { tables } };
    }
    return { text: tables.map((rows) => rows.join('\n')).join('\n\n'), data: { tables } };
  },
};

export const listDefinitionsTool: Tool = {
  name: 'list_definitions',
  description: 'List term definitions found in the retrieved passages',
  kind: 'document',
  patterns: [/\bdefinitions?\b/i, /\bdefine[sd]?\b/i, /\bglossary\b/i],
  async run({ context }: ToolInput): Promise<ToolOutput> {
    const definitions = listDefinitions(context.text);
    if (definitions.length === 0) {
      return { text: 'No definition-style lines found in the provided context.', data: { definitions } };
    }
    return {
      text: definitions.map(({ term, definition }) => `- ${term}: ${definition}`).join('\n'),
      data: { definitions },
    };
  },
};

export const citationsBySectionTool: Tool = {
  name: 'citations_by_section',
  description: 'Group the supporting citations by document section',
  kind: 'document',
  patterns: [/\bcitations?\b/i, /\bby\s+section\b/i, /\bwhich\s+sections?\b/i],
  async run({ context }: ToolInput): Promise<ToolOutput> {
    const sections = citationsBySection(context.used);
    if (sections.length === 0) {
      return { text: 'No citations available.', data: { sections } };
    }
    return {
      text: sections
        .map(({ section, citations }) => [`## ${section}`, ...citations.map((citation) => `- ${citation}`)].join('\n'))
        .join('\n\n'),
      data: { sections },
    };
  },
};

export const documentTools: Tool[] = [findTablesTool, listDefinitionsTool, citationsBySectionTool];
