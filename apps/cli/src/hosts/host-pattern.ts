import { InvalidHostPatternError } from '../common/errors';

export const MAX_EXPANDED_HOSTS = 100_000;

type PatternNode =
  | { type: 'text'; value: string }
  | { type: 'choice'; options: PatternNode[][] }
  | { type: 'range'; values: string[] };

const RANGE = /^(-?\d+)\.\.(-?\d+)(?:\.\.(-?\d+))?$/;

/**
 * Expands a brace pattern such as `{web,db}serv{01..12}` into concrete host
 * names. Groups compose as a cross product, left to right. Whitespace outside
 * braces separates independent patterns. Empty names are dropped, duplicates
 * are kept.
 */
export function expandHostPattern(pattern: string): string[] {
  const words = splitWords(pattern);
  if (words.length === 0) {
    throw new InvalidHostPatternError(pattern, 'pattern is empty');
  }

  const hosts: string[] = [];
  for (const word of words) {
    const nodes = new PatternParser(word, pattern).parse();
    const budget = MAX_EXPANDED_HOSTS - hosts.length;
    for (const host of expandSequence(nodes, budget, pattern)) {
      if (host) hosts.push(host);
    }
  }

  if (hosts.length === 0) {
    throw new InvalidHostPatternError(pattern, 'pattern expands to no hosts');
  }
  return hosts;
}

function splitWords(pattern: string): string[] {
  const words: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of pattern) {
    if (ch === '{') depth++;
    if (ch === '}') {
      if (depth === 0) throw new InvalidHostPatternError(pattern, 'unbalanced "}"');
      depth--;
    }
    if (/\s/.test(ch)) {
      if (depth > 0) throw new InvalidHostPatternError(pattern, 'whitespace inside a brace group');
      if (current) words.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (depth > 0) throw new InvalidHostPatternError(pattern, 'unbalanced "{"');
  if (current) words.push(current);
  return words;
}

class PatternParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly pattern: string,
  ) {}

  parse(): PatternNode[] {
    return this.parseSequence(false);
  }

  // Inside a group the sequence ends at the next top-level ',' or '}'.
  private parseSequence(nested: boolean): PatternNode[] {
    const nodes: PatternNode[] = [];
    let text = '';
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (nested && (ch === ',' || ch === '}')) break;
      if (ch === '{') {
        if (text) nodes.push({ type: 'text', value: text });
        text = '';
        nodes.push(this.parseGroup());
        continue;
      }
      text += ch;
      this.pos++;
    }
    if (text) nodes.push({ type: 'text', value: text });
    return nodes;
  }

  private parseGroup(): PatternNode {
    const open = this.pos;
    const close = this.findClose(open);
    const body = this.source.slice(open + 1, close);
    if (body === '') {
      throw new InvalidHostPatternError(this.pattern, 'empty group "{}"');
    }

    if (!body.includes(',') && !body.includes('{') && body.includes('..')) {
      this.pos = close + 1;
      return { type: 'range', values: expandRange(body, this.pattern) };
    }

    this.pos = open + 1;
    const options: PatternNode[][] = [this.parseSequence(true)];
    while (this.source[this.pos] === ',') {
      this.pos++;
      options.push(this.parseSequence(true));
    }
    if (this.source[this.pos] !== '}') {
      throw new InvalidHostPatternError(this.pattern, 'unbalanced "{"');
    }
    this.pos++;
    return { type: 'choice', options };
  }

  private findClose(open: number): number {
    let depth = 0;
    for (let i = open; i < this.source.length; i++) {
      if (this.source[i] === '{') depth++;
      if (this.source[i] === '}' && --depth === 0) return i;
    }
    throw new InvalidHostPatternError(this.pattern, 'unbalanced "{"');
  }
}

function expandRange(body: string, pattern: string): string[] {
  const match = RANGE.exec(body);
  if (!match) {
    throw new InvalidHostPatternError(pattern, `range {${body}} must have integer endpoints`);
  }
  const [, first, last, stepText] = match;
  const start = Number(first);
  const end = Number(last);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new InvalidHostPatternError(pattern, `range {${body}} is out of bounds`);
  }
  if (start > end) {
    throw new InvalidHostPatternError(pattern, `range {${body}} is inverted (start > end)`);
  }
  const step = Math.max(1, Math.abs(Number(stepText ?? '1')));
  if (Math.floor((end - start) / step) + 1 > MAX_EXPANDED_HOSTS) {
    throw new InvalidHostPatternError(pattern, `expands to more than ${MAX_EXPANDED_HOSTS} hosts`);
  }

  const width = isZeroPadded(first) || isZeroPadded(last) ? Math.max(first.length, last.length) : 0;
  const values: string[] = [];
  for (let n = start; n <= end; n += step) {
    values.push(formatNumber(n, width));
  }
  return values;
}

function isZeroPadded(literal: string): boolean {
  return /^-?0\d/.test(literal);
}

function formatNumber(n: number, width: number): string {
  const sign = n < 0 ? '-' : '';
  return sign + String(Math.abs(n)).padStart(width - sign.length, '0');
}

function expandSequence(nodes: PatternNode[], budget: number, pattern: string): string[] {
  let acc = [''];
  for (const node of nodes) {
    const values = expandNode(node, budget, pattern);
    if (acc.length * values.length > budget) {
      throw new InvalidHostPatternError(pattern, `expands to more than ${MAX_EXPANDED_HOSTS} hosts`);
    }
    acc = acc.flatMap(prefix => values.map(value => prefix + value));
  }
  return acc;
}

function expandNode(node: PatternNode, budget: number, pattern: string): string[] {
  switch (node.type) {
    case 'text':
      return [node.value];
    case 'range':
      return node.values;
    case 'choice': {
      const values = node.options.flatMap(option => expandSequence(option, budget, pattern));
      if (values.length > budget) {
        throw new InvalidHostPatternError(pattern, `expands to more than ${MAX_EXPANDED_HOSTS} hosts`);
      }
      return values;
    }
  }
}
