import { parse as parseYaml } from 'yaml';
import { isRecord } from '@skillroot/core';

/** Metadata and body extracted from a SKILL.md file. */
export interface ParsedSkillMarkdown {
  name?: string;
  description?: string;
  type?: string;
  body: string;
}

const DELIMITER = '---';

/** Returns the end offset of the line starting at `from`, including its newline. */
function lineEnd(content: string, from: number): number {
  const newline = content.indexOf('\n', from);
  return newline === -1 ? content.length : newline + 1;
}

function isDelimiter(line: string): boolean {
  return line.trimEnd() === DELIMITER;
}

/**
 * Split a markdown string into its frontmatter block and body.
 * Frontmatter is delimited by `---` lines at the very start.
 */
function splitFrontmatter(content: string): { header: string; body: string } | null {
  const start = content.startsWith('\uFEFF') ? 1 : 0;
  const firstEnd = lineEnd(content, start);
  if (!isDelimiter(content.slice(start, firstEnd))) return null;

  const headerLines: string[] = [];
  let pos = firstEnd;
  while (pos < content.length) {
    const end = lineEnd(content, pos);
    const line = content.slice(pos, end);
    if (isDelimiter(line)) {
      return { header: headerLines.join('\n'), body: content.slice(end) };
    }
    headerLines.push(line.replace(/\r?\n$/, ''));
    pos = end;
  }
  return null;
}

function unquote(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted ? (quoted[2] ?? '') : value;
}

/** Best-effort `key: value` scan for headers YAML refuses. */
function parseHeaderLines(header: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const line of header.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const key = line.slice(0, colon).trim();
    if (!key || key.startsWith('#')) continue;
    result[key] = unquote(line.slice(colon + 1).trim());
  }
  return result;
}

/**
 * Extract frontmatter from a markdown string as a plain record.
 * YAML is tried first; malformed YAML falls back to a line scan.
 */
export function extractFrontmatter(content: string): Record<string, unknown> {
  const split = splitFrontmatter(content);
  if (!split) return {};

  try {
    const parsed: unknown = parseYaml(split.header);
    if (isRecord(parsed)) return parsed;
  } catch {
    // fall through to the line scan
  }
  return parseHeaderLines(split.header);
}

function stringField(frontmatter: Record<string, unknown>, key: string): string | undefined {
  const value = frontmatter[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Parse a SKILL.md file's text into metadata and body.
 * Never throws; missing or unusable fields are left undefined.
 */
export function parseSkillMarkdown(content: string): ParsedSkillMarkdown {
  const split = splitFrontmatter(content);
  if (!split) return { body: content };

  const frontmatter = extractFrontmatter(content);
  const parsed: ParsedSkillMarkdown = { body: split.body };

  const name = stringField(frontmatter, 'name');
  if (name !== undefined) parsed.name = name;
  const description = stringField(frontmatter, 'description');
  if (description !== undefined) parsed.description = description;
  const type = stringField(frontmatter, 'type');
  if (type !== undefined) parsed.type = type;

  return parsed;
}
