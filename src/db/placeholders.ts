/**
 * Convert `?` placeholders to PostgreSQL `$1, $2, $3` style.
 * `?` inside single-quoted literals is left alone and `??` yields a literal `?`.
 */
export function convertPlaceholders(text: string): string {
  let idx = 0;
  let inString = false;
  let result = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === "'") {
      // '' inside a literal is an escaped quote
      if (inString && text[i + 1] === "'") {
        result += "''";
        i++;
        continue;
      }
      inString = !inString;
      result += ch;
      continue;
    }

    if (ch === '?' && !inString) {
      if (text[i + 1] === '?') {
        result += '?';
        i++;
        continue;
      }
      idx++;
      result += `$${idx}`;
      continue;
    }

    result += ch;
  }

  return result;
}

