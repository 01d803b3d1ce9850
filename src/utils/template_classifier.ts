import { lexTemplate, TemplateSyntaxError, type TemplateUnit } from './template_lexer';
import { logger } from './logger';

export enum RegionKind {
  Static = 'static',
  SafeExpression = 'safe_expression',
  ControlFlow = 'control_flow',
  Unsafe = 'unsafe',
}

export interface Region {
  start: number;
  end: number;
  kind: RegionKind;
  content: string;
}

export interface SafetyVerdict {
  canRewrite: boolean;
  reason: string;
}

export interface MaskedSpan {
  start: number;
  end: number;
  maskedText: string;
}

/** Accessor calls whose output is a relation or literal, never SQL logic. */
export const SAFE_EXPRESSION_NAMES: ReadonlySet<string> = new Set([
  'ref',
  'source',
  'var',
  'config',
  'this',
  'target',
  'env_var',
]);

export const CONTROL_FLOW_KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'elif',
  'else',
  'endif',
  'for',
  'endfor',
  'block',
  'endblock',
  'macro',
  'endmacro',
  'set',
  'endset',
]);

export const EXPRESSION_PLACEHOLDER = ' __PLACEHOLDER__ ';
// Trailing comma keeps argument and select lists syntactically complete.
export const BLOCK_PLACEHOLDER = ' __JINJA__, ';

function kindOf(unit: TemplateUnit): RegionKind {
  switch (unit.type) {
    case 'data':
      return RegionKind.Static;
    case 'expression':
      return unit.name !== undefined && SAFE_EXPRESSION_NAMES.has(unit.name)
        ? RegionKind.SafeExpression
        : RegionKind.Unsafe;
    case 'block':
      return unit.name !== undefined && CONTROL_FLOW_KEYWORDS.has(unit.name)
        ? RegionKind.ControlFlow
        : RegionKind.Unsafe;
    case 'comment':
      return RegionKind.ControlFlow;
  }
}

/**
 * Partitions a template into regions that tile `[0, source.length)`.
 * Malformed templating syntax yields a single unsafe region for the whole text.
 */
export function classify(source: string): Region[] {
  let units: TemplateUnit[];
  try {
    units = lexTemplate(source);
  } catch (error) {
    if (error instanceof TemplateSyntaxError) {
      logger.debug(`Template could not be tokenized: ${error.message}`);
      return [{ start: 0, end: source.length, kind: RegionKind.Unsafe, content: source }];
    }
    throw error;
  }

  return units.map(unit => ({
    start: unit.start,
    end: unit.end,
    kind: kindOf(unit),
    content: source.slice(unit.start, unit.end),
  }));
}

export function canSafelyRewrite(regions: readonly Region[]): SafetyVerdict {
  // Control flow is fine: masking turns it into an opaque placeholder.
  if (regions.some(region => region.kind === RegionKind.Unsafe)) {
    return { canRewrite: false, reason: 'Template contains unsupported templating constructs' };
  }
  return { canRewrite: true, reason: 'Template is safe to rewrite' };
}

function maskRegion(region: Region): string {
  switch (region.kind) {
    case RegionKind.Static:
      return region.content;
    case RegionKind.SafeExpression:
      return EXPRESSION_PLACEHOLDER;
    case RegionKind.ControlFlow:
    case RegionKind.Unsafe:
      return BLOCK_PLACEHOLDER;
  }
}

export function extractMaskedSpans(regions: readonly Region[]): MaskedSpan[] {
  const maskedText = regions.map(maskRegion).join('');
  if (!maskedText.trim()) {
    return [];
  }

  const end = regions[regions.length - 1].end;
  return [{ start: 0, end, maskedText }];
}
