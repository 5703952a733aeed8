// Surface grammar of the calculator, as regular expression sources.

export const IDENT = '[A-Za-z_]\\w*';
export const NUMERAL = '\\d+\\.?\\d*(?:[eE][+-]?\\d+)?i?';
export const OPERATOR = '[*^+/%-]';
export const GROUPER = '[()]';

/** Stands in for an isolated function call during lexing. Never valid in input. */
export const PLACEHOLDER = '\u001a';

export const IDENT_RE = new RegExp(`^${IDENT}$`);
export const NUMERAL_RE = new RegExp(`^${NUMERAL}$`);

export const CALL_HEAD = new RegExp(`${IDENT}\\[`, 'g');

const VALID = `(${PLACEHOLDER})|(${NUMERAL})|(${IDENT})|(${OPERATOR})|(${GROUPER})`;
/** Groups 1-5 are the valid fragment kinds, group 6 a run of anything else. */
export const FRAGMENT = new RegExp(`${VALID}|((?:(?!${VALID}).)+)`, 'gs');

export const FUNCTION_DEFINITION = new RegExp(
  `^(${IDENT})\\[((?:${IDENT}(?:,${IDENT})*)?)\\]=(.+)$`,
  's',
);
export const BASE_CASE = new RegExp(
  `^(${IDENT})\\[(${NUMERAL}(?:,${NUMERAL})*)\\]=(${NUMERAL})$`,
);
export const VARIABLE_DEFINITION = new RegExp(`^(${IDENT})=(.+)$`, 's');
