import { SERIES_FORMS } from './compiler.js';
import type { Operand } from './types.js';

/**
 * Names of the variables and functions an operand depends on. The counter of
 * a `sum` or `prod` is bound by the form itself, so it is left out of the
 * body's references.
 */
export function references(operand: Operand): Set<string> {
  const out = new Set<string>();
  collect(operand, out);
  return out;
}

function collect(operand: Operand, out: Set<string>): void {
  switch (operand.t) {
    case 'num':
      return;
    case 'var':
      out.add(operand.name);
      return;
    case 'expr':
      for (const token of operand.tokens) {
        if (token.t !== 'op' && token.t !== 'group') collect(token, out);
      }
      return;
    case 'call': {
      out.add(operand.name);
      const [counter, start, end, body] = operand.args;
      if (SERIES_FORMS.has(operand.name) && operand.args.length === 4 && counter.t === 'var') {
        collect(start, out);
        collect(end, out);
        for (const name of references(body)) if (name !== counter.name) out.add(name);
        return;
      }
      for (const arg of operand.args) collect(arg, out);
    }
  }
}
