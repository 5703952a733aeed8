import { compileError } from '../errors.js';
import { CALL_HEAD, FRAGMENT, PLACEHOLDER } from './grammar.js';

export type LexTag = 'numeral' | 'variable' | 'operator' | 'grouper' | 'call' | 'invalid';

export interface Lexeme {
  tag: LexTag;
  text: string;
}

const GROUP_TAGS: readonly LexTag[] = ['call', 'numeral', 'variable', 'operator', 'grouper', 'invalid'];

/**
 * Replaces each outermost `name[...]` with the placeholder and returns the
 * calls in order of appearance.
 */
function isolateCalls(source: string): { text: string; calls: string[] } {
  const calls: string[] = [];
  let text = '';
  let copied = 0;
  for (const head of source.matchAll(CALL_HEAD)) {
    const start = head.index ?? 0;
    if (start < copied) continue; // nested inside a call already taken
    let pos = start + head[0].length;
    let depth = 1;
    while (pos < source.length && depth > 0) {
      const c = source[pos++];
      if (c === '[') depth++;
      else if (c === ']') depth--;
    }
    if (depth !== 0)
      throw compileError(`"${source}" missing closing function bracket ] at position ${pos}`);
    text += source.slice(copied, start) + PLACEHOLDER;
    calls.push(source.slice(start, pos));
    copied = pos;
  }
  return { text: text + source.slice(copied), calls };
}

function tagOf(match: RegExpMatchArray): LexTag {
  for (let g = 1; g <= GROUP_TAGS.length; g++) {
    if (match[g] !== undefined) return GROUP_TAGS[g - 1];
  }
  return 'invalid';
}

/** Splits whitespace-free source into lexemes. Function calls stay whole. */
export function lex(source: string): Lexeme[] {
  if (source.length === 0) throw compileError('empty expression');
  if (source.includes(PLACEHOLDER))
    throw compileError(`"${source}" is not a valid calculator expression`);

  const { text, calls } = isolateCalls(source);
  const lexemes: Lexeme[] = [];
  let next = 0;
  for (const m of text.matchAll(FRAGMENT)) {
    const tag = tagOf(m);
    lexemes.push({ tag, text: tag === 'call' ? calls[next++] : m[0] });
  }
  if (lexemes.length === 0)
    throw compileError(`"${source}" is not a valid calculator expression`);
  return lexemes;
}
