import { describe, it, expect } from 'vitest';
import { lexTemplate, TemplateSyntaxError } from '../../src/utils/template_lexer';

describe('template_lexer', () => {
  describe('WHEN the template mixes data and tags', () => {
    it('SHOULD return units covering the whole source in order', () => {
      const source = "SELECT {{ ref('a') }} {% if x %}b{% endif %}{# note #}";

      const units = lexTemplate(source);

      expect(units.map(unit => [unit.type, source.slice(unit.start, unit.end)])).toEqual([
        ['data', 'SELECT '],
        ['expression', "{{ ref('a') }}"],
        ['data', ' '],
        ['block', '{% if x %}'],
        ['data', 'b'],
        ['block', '{% endif %}'],
        ['comment', '{# note #}'],
      ]);
    });

    it('SHOULD record the first identifier of each tag', () => {
      const units = lexTemplate("{{ var('days', 30) }}{%- set total = 1 -%}");

      expect(units.map(unit => unit.name)).toEqual(['var', 'set']);
    });
  });

  describe('WHEN a tag contains nested brackets and strings', () => {
    it('SHOULD only close the tag once the brackets are balanced', () => {
      const source = "{{ config(tags=['a', 'b}}'], meta={'k': 1}) }} tail";

      const units = lexTemplate(source);

      expect(units).toEqual([
        { type: 'expression', start: 0, end: source.length - 5, name: 'config' },
        { type: 'data', start: source.length - 5, end: source.length },
      ]);
    });
  });

  describe('WHEN a single brace appears in data', () => {
    it('SHOULD keep it as data', () => {
      expect(lexTemplate('SELECT MAP{1: 2}')).toEqual([{ type: 'data', start: 0, end: 16 }]);
    });
  });

  describe('WHEN the template is malformed', () => {
    it('SHOULD reject a call left open before the closing delimiter', () => {
      expect(() => lexTemplate("{{ ref('x' }}")).toThrow(TemplateSyntaxError);
    });

    it('SHOULD reject an unterminated expression', () => {
      expect(() => lexTemplate('SELECT {{ ref("x") ')).toThrow(TemplateSyntaxError);
    });

    it('SHOULD reject an unterminated string inside a block', () => {
      expect(() => lexTemplate("{% set x = 'abc %}")).toThrow(TemplateSyntaxError);
    });

    it('SHOULD reject an unterminated comment', () => {
      expect(() => lexTemplate('SELECT 1 {# todo')).toThrow(TemplateSyntaxError);
    });

    it('SHOULD reject a stray closing brace inside an expression', () => {
      expect(() => lexTemplate('{{ x } }}')).toThrow(TemplateSyntaxError);
    });
  });

  it('SHOULD return no units for empty text', () => {
    expect(lexTemplate('')).toEqual([]);
  });
});
