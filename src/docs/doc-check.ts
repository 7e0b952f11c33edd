/**
 * Document-integrity checks for style-guide markdown.
 *
 * These run against the guide itself (or the rule documents under rules/),
 * not against component source.
 */

import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import { toRuleResult, resolveSeverity } from '../evaluator';
import type { RuleResult, RuleSetting, Severity, Violation } from '../types';

export type Heading = { level: number; text: string; slug: string; line: number };

export type CodeBlock = {
  info: string;
  content: string;
  line: number;
  section: number; // index into headings, -1 before the first heading
};

export type Link = { text: string; target: string; line: number };

export type ParsedDoc = {
  headings: Heading[];
  blocks: CodeBlock[];
  links: Link[];
  anchors: Set<string>; // explicit <a id/name> anchors
};

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const LINK = /\[([^\]]*)\]\(\s*<?([^)\s>]+)>?(?:\s+"[^"]*")?\s*\)/g;
const HTML_ANCHOR = /<a\s+(?:name|id)="([^"]+)"/g;

function headingText(raw: string) {
  // optional closing sequence: "## Title ##"
  return raw.replace(/(^|[ \t]+)#+$/, '').trim();
}

/** Anchor slug the way GitHub renders headings, with -1, -2 for repeats. */
export function createSlugger() {
  const occurrences = new Map<string, number>();
  return (text: string) => {
    const original = text
      .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
      .replace(/[`*]/g, '')
      .toLowerCase()
      .replace(/[^\p{L}\p{M}\p{N}\p{Pc} -]/gu, '')
      .replace(/ /g, '-');
    let slug = original;
    while (occurrences.has(slug)) {
      const n = (occurrences.get(original) ?? 0) + 1;
      occurrences.set(original, n);
      slug = `${original}-${n}`;
    }
    occurrences.set(slug, 0);
    return slug;
  };
}

function safeDecode(decode: (s: string) => string, s: string) {
  try {
    return decode(s);
  } catch {
    return s; // not valid percent-encoding
  }
}

type OpenFence = { marker: string; info: string; line: number; body: string[] };

export function parseMarkdown(text: string, lineOffset = 0): ParsedDoc {
  const lines = text.split(/\r?\n/);
  const doc: ParsedDoc = { headings: [], blocks: [], links: [], anchors: new Set() };
  const slug = createSlugger();
  const closeBlock = (f: OpenFence) =>
    doc.blocks.push({
      info: f.info,
      content: f.body.join('\n'),
      line: f.line,
      section: doc.headings.length - 1,
    });

  let fence: OpenFence | null = null;
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const lineNo = i + 1 + lineOffset;

    if (fence) {
      const ch = fence.marker[0] === '`' ? '`' : '~';
      if (new RegExp(`^ {0,3}${ch}{${fence.marker.length},}\\s*$`).test(raw)) {
        closeBlock(fence);
        fence = null;
      } else {
        fence.body.push(raw);
      }
      continue;
    }

    const open = FENCE_OPEN.exec(raw);
    if (open) {
      fence = { marker: open[1], info: open[2].trim(), line: lineNo, body: [] };
      continue;
    }

    const h = HEADING.exec(raw);
    if (h) {
      const title = headingText(h[2] ?? '');
      doc.headings.push({ level: h[1].length, text: title, slug: slug(title), line: lineNo });
    }

    // inline code never holds real links
    const scan = raw.replace(/`[^`]*`/g, '');
    for (const m of scan.matchAll(LINK)) {
      doc.links.push({ text: m[1], target: m[2], line: lineNo });
    }
    for (const m of scan.matchAll(HTML_ANCHOR)) {
      doc.anchors.add(m[1].toLowerCase());
    }
  }

  // an unterminated fence runs to the end of the document
  if (fence) closeBlock(fence);
  return doc;
}

export type DocCheckContext = {
  file: string;
  exists: (p: string) => boolean;
};

type DocFinding = { line: number; message: string; suggestion?: string };

export type DocRule = {
  id: string;
  description: string;
  defaultSeverity: Severity;
  check(doc: ParsedDoc, ctx: DocCheckContext): DocFinding[];
};

export const tocAnchors: DocRule = {
  id: 'toc-anchors',
  description: 'Every table-of-contents link resolves to a heading anchor.',
  defaultSeverity: 'error',
  check(doc) {
    const known = new Set([...doc.headings.map((h) => h.slug), ...doc.anchors]);
    return doc.links
      .filter((l) => l.target.startsWith('#'))
      .filter((l) => {
        const anchor = safeDecode(decodeURIComponent, l.target.slice(1));
        return !known.has(anchor.toLowerCase());
      })
      .map((l) => ({
        line: l.line,
        message: `Link "${l.target}" does not match any heading`,
      }));
  },
};

const BAD = /^\s*\/\/\s*bad\b/im;
const GOOD = /^\s*\/\/\s*good\b/im;

export const badGoodPairing: DocRule = {
  id: 'bad-good-pairing',
  description: 'Every "// bad" example is paired with a "// good" one in the same section.',
  defaultSeverity: 'error',
  check(doc) {
    const sections = new Map<number, CodeBlock[]>();
    for (const b of doc.blocks) {
      sections.set(b.section, [...(sections.get(b.section) ?? []), b]);
    }
    const findings: DocFinding[] = [];
    for (const [section, blocks] of sections) {
      const bad = blocks.find((b) => BAD.test(b.content));
      if (!bad || blocks.some((b) => GOOD.test(b.content))) continue;
      const title = section >= 0 ? doc.headings[section].text : '(preamble)';
      findings.push({
        line: bad.line,
        message: `Section "${title}" has a "// bad" example without a "// good" one`,
        suggestion: 'Add a code block starting with "// good"',
      });
    }
    return findings.sort((a, b) => a.line - b.line);
  },
};

export const uniqueHeadings: DocRule = {
  id: 'unique-headings',
  description: 'No two headings at the same level share the same text.',
  defaultSeverity: 'error',
  check(doc) {
    const first = new Map<string, Heading>();
    const findings: DocFinding[] = [];
    for (const h of doc.headings) {
      const key = `${h.level}:${h.text}`;
      const prev = first.get(key);
      if (!prev) {
        first.set(key, h);
        continue;
      }
      findings.push({
        line: h.line,
        message: `Duplicate level-${h.level} heading "${h.text}" (first on line ${prev.line})`,
      });
    }
    return findings;
  },
};

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

export const relativeLinks: DocRule = {
  id: 'relative-links',
  description: 'Links to local files resolve relative to the document.',
  defaultSeverity: 'error',
  check(doc, ctx) {
    const findings: DocFinding[] = [];
    for (const l of doc.links) {
      if (l.target.startsWith('#') || l.target.startsWith('//') || SCHEME.test(l.target)) {
        continue;
      }
      const target = l.target.split(/[#?]/)[0];
      if (!target) continue;
      const resolved = path.resolve(path.dirname(ctx.file), safeDecode(decodeURI, target));
      if (ctx.exists(resolved)) continue;
      findings.push({ line: l.line, message: `Linked file "${target}" does not exist` });
    }
    return findings;
  },
};

export const DOC_RULES: DocRule[] = [tocAnchors, badGoodPairing, uniqueHeadings, relativeLinks];

export type DocCheckOptions = {
  settings?: Record<string, RuleSetting>;
  exists?: (p: string) => boolean;
};

/** Number of lines taken by front-matter, so findings point into the original file. */
function frontMatterOffset(raw: string, content: string, hasMatter: boolean) {
  if (!hasMatter) return 0;
  const idx = content ? raw.lastIndexOf(content) : raw.length;
  return raw.slice(0, Math.max(idx, 0)).split(/\r?\n/).length - 1;
}

export function checkDocument(
  raw: string,
  file: string,
  options: DocCheckOptions = {}
): RuleResult[] {
  const parsed = matter(raw);
  const offset = frontMatterOffset(raw, parsed.content, matter.test(raw));
  const doc = parseMarkdown(parsed.content, offset);
  const ctx: DocCheckContext = { file, exists: options.exists ?? fs.existsSync };

  const results: RuleResult[] = [];
  for (const rule of DOC_RULES) {
    const severity = resolveSeverity(rule.id, rule.defaultSeverity, options.settings);
    if (severity === 'off') continue;
    const violations: Violation[] = rule.check(doc, ctx).map((f) => {
      const v: Violation = {
        ruleId: rule.id,
        severity,
        message: f.message,
        line: f.line,
        column: 1,
      };
      if (f.suggestion) v.suggestion = f.suggestion;
      return v;
    });
    results.push(toRuleResult(rule.id, severity, violations));
  }
  return results;
}
