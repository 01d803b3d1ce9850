import fs from 'fs';
import path from 'path';
import _ from 'lodash';
import { canSafelyRewrite, classify, extractMaskedSpans, type MaskedSpan } from './template_classifier';
import { SqlParseError } from './sql_parser';
import { getDialectProfile, UnsupportedDialectError } from './dialect_registry';
import { functionDiffers } from './dialect_oracle';
import type { DialectProfile, FunctionNode } from './dialect_profile';
import { logger } from './logger';

export interface FunctionCandidate {
  depth: number;
  /** Upper-case function name taken from the primary dialect's rendering. */
  renderedName: string;
  /** Full call text as rendered under the primary dialect. */
  renderedText: string;
  node: FunctionNode;
}

export interface RewriteDirective {
  originalText: string;
  replacementText: string;
}

export interface RewriteOptions {
  dialects: readonly string[];
  primaryDialect: string;
}

export interface RewriteFileOptions extends RewriteOptions {
  dryRun: boolean;
}

export interface RewriteResult {
  text: string;
  modified: boolean;
  reason: string;
}

interface SpliceState {
  readonly text: string;
  readonly offset: number;
}

// Argument-less forms of these aggregates behave the same everywhere.
const ORDER_ONLY_AGGREGATES: ReadonlySet<string> = new Set(['count', 'sum', 'min', 'max', 'avg']);

const RENDERED_CALL = /^([A-Z_][A-Z0-9_]*)\s*\(([\s\S]*)\)$/i;
const RENDERED_CALL_NAME = /^([A-Z_][A-Z0-9_]*)\s*\(/i;
const RENDERED_BARE_NAME = /^([A-Z_][A-Z0-9_]*)$/i;

export const MACRO_PREFIX = 'portable_';

export function extractRenderedName(rendered: string): string | null {
  const match = rendered.match(RENDERED_CALL_NAME) ?? rendered.match(RENDERED_BARE_NAME);
  return match ? match[1].toUpperCase() : null;
}

/**
 * Parses masked SQL under `profile` and returns every function call it contains,
 * named by its canonical rendering. Calls the profile cannot render are dropped.
 */
export function collectFunctionCandidates(maskedSql: string, profile: DialectProfile): FunctionCandidate[] {
  const parsed = profile.parse(maskedSql);
  const candidates: FunctionCandidate[] = [];

  parsed.tree.calls.forEach(call => {
    const node: FunctionNode = { call, dialect: parsed.dialect };
    let renderedText: string;
    try {
      renderedText = profile.render(node);
    } catch (error) {
      logger.debug(`Skipping ${call.name}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
    const renderedName = extractRenderedName(renderedText);
    if (renderedName) {
      candidates.push({ depth: call.depth, renderedName, renderedText, node });
    }
  });

  return candidates;
}

export function isMeaningfullyRewritable(candidate: FunctionCandidate): boolean {
  if (candidate.renderedText.includes('*')) {
    return false;
  }
  return !(
    candidate.node.call.argumentCount === 0 && ORDER_ONLY_AGGREGATES.has(candidate.renderedName.toLowerCase())
  );
}

function quoteTemplateString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Builds `{{ portable_<name>(...) }}` from a rendered call. Argument text that is
 * not already a literal is passed to the macro as a quoted string.
 */
export function buildMacroCall(renderedName: string, renderedText: string): string {
  const macroName = `${MACRO_PREFIX}${renderedName.toLowerCase()}`;
  const match = renderedText.match(RENDERED_CALL);
  if (!match) {
    return `{{ ${macroName}() }}`;
  }

  const args = match[2].trim();
  if (args && !args.startsWith("'") && !args.startsWith('"')) {
    return `{{ ${macroName}(${quoteTemplateString(args)}) }}`;
  }
  return `{{ ${macroName}(${args}) }}`;
}

/**
 * Rewrite directives for one masked span, longest original text first so a
 * short call never matches inside a longer one. Deeper calls win ties.
 */
export function planRewrites(maskedSql: string, options: RewriteOptions): RewriteDirective[] {
  const profile = getDialectProfile(options.primaryDialect);

  const selected = collectFunctionCandidates(maskedSql, profile)
    .filter(isMeaningfullyRewritable)
    .filter(candidate => functionDiffers(candidate.node, options.dialects));

  return selected
    .sort((a, b) => b.renderedText.length - a.renderedText.length || b.depth - a.depth)
    .map(candidate => ({
      originalText: candidate.renderedText,
      replacementText: buildMacroCall(candidate.renderedName, candidate.renderedText),
    }));
}

/**
 * Locates `pattern` in `text`, exactly first, then case-insensitively. Returns the
 * matched slice in the text's own casing.
 */
export function findOccurrence(pattern: string, text: string): { index: number; matched: string } | null {
  const exact = text.indexOf(pattern);
  if (exact !== -1) {
    return { index: exact, matched: pattern };
  }

  // Offsets come from the original text; lower-casing can change its length.
  const folded = new RegExp(_.escapeRegExp(pattern), 'i').exec(text);
  return folded ? { index: folded.index, matched: folded[0] } : null;
}

function countOccurrences(text: string, token: string): number {
  return text.split(token).length - 1;
}

// Approximate: counts expression openers left unclosed before `index`.
export function isInsideTemplateExpression(text: string, index: number): boolean {
  const before = text.slice(0, index);
  return countOccurrences(before, '{{') - countOccurrences(before, '}}') > 0;
}

export function applyDirectives(spanText: string, directives: readonly RewriteDirective[]): string {
  return directives.reduce((text, directive) => {
    const occurrence = findOccurrence(directive.originalText, text);
    if (!occurrence || isInsideTemplateExpression(text, occurrence.index)) {
      return text;
    }
    const { index, matched } = occurrence;
    return text.slice(0, index) + directive.replacementText + text.slice(index + matched.length);
  }, spanText);
}

/**
 * Splices each span's rewritten text back into `source`, left to right, carrying
 * the cumulative length change so later spans are sliced at the right offsets.
 */
export function spliceSpans(
  source: string,
  spans: readonly MaskedSpan[],
  rewriteSpan: (span: MaskedSpan, currentText: string) => string
): string {
  const initial: SpliceState = { text: source, offset: 0 };

  const final = spans.reduce<SpliceState>((state, span) => {
    const start = span.start + state.offset;
    const end = span.end + state.offset;
    const original = state.text.slice(start, end);
    const rewritten = rewriteSpan(span, original);
    if (rewritten === original) {
      return state;
    }
    return {
      text: state.text.slice(0, start) + rewritten + state.text.slice(end),
      offset: state.offset + rewritten.length - original.length,
    };
  }, initial);

  return final.text;
}

/**
 * Pure text form of the rewrite: classify, mask, parse, plan and substitute.
 */
export function rewriteText(source: string, options: RewriteOptions): RewriteResult {
  if (!source) {
    return { text: source, modified: false, reason: 'Empty source' };
  }

  const regions = classify(source);
  const verdict = canSafelyRewrite(regions);
  if (!verdict.canRewrite) {
    return { text: source, modified: false, reason: verdict.reason };
  }

  const spans = extractMaskedSpans(regions);
  if (spans.length === 0) {
    return { text: source, modified: false, reason: 'No SQL content after masking' };
  }

  const text = spliceSpans(source, spans, (span, currentText) => {
    let directives: RewriteDirective[];
    try {
      directives = planRewrites(span.maskedText, options);
    } catch (error) {
      if (error instanceof SqlParseError || error instanceof UnsupportedDialectError) {
        logger.debug(`Skipping span [${span.start}, ${span.end}): ${error.message}`);
        return currentText;
      }
      throw error;
    }
    return applyDirectives(currentText, directives);
  });

  const modified = text !== source;
  return { text, modified, reason: modified ? 'Rewrote non-portable functions' : 'No non-portable functions found' };
}

function writeFileAtomically(filePath: string, content: string): void {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Rewrites one model file in place. Returns whether the text changed, whether or
 * not it was written (`dryRun`). I/O failures leave the file untouched and report false.
 */
export function rewriteFile(filePath: string, options: RewriteFileOptions): boolean {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.debug(`Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }

  const result = rewriteText(source, options);
  if (!result.modified) {
    logger.debug(`${filePath} unchanged: ${result.reason}`);
    return false;
  }

  if (!options.dryRun) {
    try {
      writeFileAtomically(filePath, result.text);
    } catch (error) {
      logger.warn(`Could not write ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
  return true;
}
