/**
 * List-literal manifests.
 *
 * A manifest written as `['^lib.*\\.so$', "main"]` is a list literal: quoted
 * items use string-literal escapes (`\\` is one backslash, `\n` a newline)
 * and unknown escapes such as `\.` are kept with their backslash. `r'...'`
 * items are raw. YAML would read the same text with different escape rules,
 * so the items are taken from yaml's concrete syntax tree and decoded here.
 */

import { CST, Parser, parse as parseYaml } from 'yaml';

const ESCAPE = /\\(\r\n|\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const RAW_ITEM = /^[rR](['"])([\s\S]*)\1$/;

const MAX_CODE_POINT = 0x10ffff;

/**
 * Decode the escapes of a quoted list item.
 */
export function decodeEscapes(text: string): string {
  return text.replace(ESCAPE, (match: string, escape: string) => {
    if (escape === '\n' || escape === '\r\n') return '';

    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) return simple;

    const hex = escape[0] === 'x' || escape[0] === 'u' || escape[0] === 'U';
    const codePoint = hex ? parseInt(escape.slice(1), 16) : parseInt(escape, 8);
    return codePoint > MAX_CODE_POINT ? match : String.fromCodePoint(codePoint);
  });
}

function isTerminated(source: string, quote: string): boolean {
  return source.length >= 2 && source.startsWith(quote) && source.endsWith(quote);
}

/**
 * Value of one list item, or undefined when the item is malformed.
 * Items that are not scalars decode to null so validation rejects them.
 */
function decodeItem(token: CST.Token): unknown {
  if (!CST.isScalar(token)) return null;

  switch (token.type) {
    case 'single-quoted-scalar':
      return isTerminated(token.source, "'") ? decodeEscapes(token.source.slice(1, -1)) : undefined;
    case 'double-quoted-scalar':
      return isTerminated(token.source, '"') ? decodeEscapes(token.source.slice(1, -1)) : undefined;
    case 'scalar': {
      const raw = RAW_ITEM.exec(token.source);
      if (raw) return raw[2];
      return parseYaml(token.source);
    }
    default:
      return null;
  }
}

/**
 * Items of a manifest written as a single `[...]` list literal.
 * @returns undefined when the content is not a well-formed list literal, in
 * which case it is read as plain YAML
 */
export function parseListLiteral(content: string): unknown[] | undefined {
  const documents: CST.Document[] = [];

  for (const token of new Parser().parse(content)) {
    if (token.type === 'error') return undefined;
    if (token.type === 'document') documents.push(token);
  }

  const [document] = documents;
  if (documents.length !== 1 || !document) return undefined;

  const collection = document.value;
  if (!collection || collection.type !== 'flow-collection' || collection.start.source !== '[') {
    return undefined;
  }
  if (!collection.end.some((token) => token.type === 'flow-seq-end')) {
    return undefined;
  }

  const items: unknown[] = [];
  for (const item of collection.items) {
    if (!item.value) continue; // trailing comma
    if (item.key || item.sep?.some((token) => token.type === 'map-value-ind')) {
      items.push(null);
      continue;
    }

    const value = decodeItem(item.value);
    if (value === undefined) return undefined;
    items.push(value);
  }

  return items;
}
