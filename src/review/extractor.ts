import { z } from 'zod';
import {
  SEVERITIES,
  DEFAULT_FINDING_CONFIDENCE,
  DEFAULT_FINDING_DESCRIPTION,
  DEFAULT_FINDING_TITLE,
} from './findings.js';
import type { Category, Finding } from './findings.js';

const JSON_FENCE = /```json[^\S\n]*([\s\S]*?)(?:```|$)/i;
const ANY_FENCE = /```([\s\S]*?)(?:```|$)/;
const FENCE_LANGUAGE_TAG = /^[\w.+-]+[^\S\n]*\n/;

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

export type FindingsDecodeResult =
  | { status: 'ok'; findings: readonly Finding[] }
  | { status: 'degraded'; reason: string; findings: readonly Finding[] };

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

const optionalText = z.string().optional().catch(undefined);
const optionalLine = z.number().int().optional().catch(undefined);

const rawFindingSchema = z.object({
  severity: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      z.enum(SEVERITIES)
    )
    .catch('SUGGESTION'),
  title: z
    .string()
    .refine((value) => value.trim().length > 0)
    .catch(DEFAULT_FINDING_TITLE),
  description: z.string().catch(DEFAULT_FINDING_DESCRIPTION),
  file_path: optionalText,
  line_start: optionalLine,
  line_end: optionalLine,
  code_snippet: optionalText,
  suggested_fix: optionalText,
  confidence: z.number().transform(clampUnit).catch(DEFAULT_FINDING_CONFIDENCE),
});

const findingsResponseSchema = z.object({
  findings: z.array(rawFindingSchema).optional(),
});

type RawFinding = z.output<typeof rawFindingSchema>;

/**
 * Pulls the JSON candidate out of generator text: the first ```json block,
 * else the first fenced block of any kind, else the whole text.
 */
export function extractJsonPayload(text: string): string {
  const jsonBlock = JSON_FENCE.exec(text);
  if (jsonBlock) {
    return jsonBlock[1].trim();
  }

  const anyBlock = ANY_FENCE.exec(text);
  if (anyBlock) {
    return anyBlock[1].replace(FENCE_LANGUAGE_TAG, '').trim();
  }

  return text.trim();
}

export function parseJsonPayload(text: string): JsonParseResult {
  const payload = extractJsonPayload(text);
  try {
    return { ok: true, value: JSON.parse(payload) };
  } catch (error) {
    return {
      ok: false,
      reason: `invalid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
    };
  }
}

function toFinding(raw: RawFinding, category: Category): Finding {
  return Object.freeze({
    severity: raw.severity,
    category,
    title: raw.title,
    description: raw.description,
    filePath: raw.file_path,
    lineStart: raw.line_start,
    lineEnd: raw.line_end,
    codeSnippet: raw.code_snippet,
    suggestedFix: raw.suggested_fix,
    confidence: raw.confidence,
  });
}

export function decodeFindings(text: string, category: Category): FindingsDecodeResult {
  const parsed = parseJsonPayload(text);
  if (!parsed.ok) {
    return { status: 'degraded', reason: parsed.reason, findings: [] };
  }

  const result = findingsResponseSchema.safeParse(parsed.value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    return {
      status: 'degraded',
      reason: `unexpected shape at ${path}: ${issue ? issue.message : 'invalid input'}`,
      findings: [],
    };
  }

  const findings = (result.data.findings ?? []).map(raw => toFinding(raw, category));
  return { status: 'ok', findings: Object.freeze(findings) };
}

/** Never throws: any malformed output yields an empty list. */
export function extractFindings(text: string, category: Category): readonly Finding[] {
  return decodeFindings(text, category).findings;
}
