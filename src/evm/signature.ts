const NAME = /^[A-Za-z_$][A-Za-z0-9_$]*\(/;
const ELEMENTARY = /[A-Za-z0-9_]+/y;
const ARRAY_SUFFIX = /\[[0-9]*\]/y;

/**
 * Check the canonical function-signature form hashed by `selector("...")`: `name(type,...)`
 * with no whitespace. Types are elementary names or parenthesized tuples, each with optional
 * `[]`/`[N]` suffixes.
 */
export function isFunctionSignature(sig: string): boolean {
  const head = NAME.exec(sig);
  if (!head) return false;
  let i = head[0].length;

  function sticky(re: RegExp): string | undefined {
    re.lastIndex = i;
    const m = re.exec(sig);
    return m ? m[0] : undefined;
  }

  function typeList(): boolean {
    if (sig.charAt(i) === ')') {
      i++;
      return true;
    }
    for (;;) {
      if (!type()) return false;
      const ch = sig.charAt(i);
      i++;
      if (ch === ')') return true;
      if (ch !== ',') return false;
    }
  }

  function type(): boolean {
    if (sig.charAt(i) === '(') {
      i++;
      if (!typeList()) return false;
    } else {
      const name = sticky(ELEMENTARY);
      if (name === undefined) return false;
      i += name.length;
    }
    for (let suffix = sticky(ARRAY_SUFFIX); suffix !== undefined; suffix = sticky(ARRAY_SUFFIX)) {
      i += suffix.length;
    }
    return true;
  }

  return typeList() && i === sig.length;
}
