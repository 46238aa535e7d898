/**
 * Formats the comment placed above a generated declaration or field:
 * `// Name: doc` with one comment line per doc line, or `// Name ...` when the
 * schema has no documentation for it.
 */
export function formatComment(name: string, doc: string | undefined, prefix: string, indent = ''): string {
  if (!doc) {
    return `${indent}${prefix} ${name} ...`;
  }
  const lines = doc
    .replaceAll('\t', '')
    .split(/\r?\n/)
    .map((line) => line.trim());
  return [`${indent}${prefix} ${name}: ${lines[0]}`, ...lines.slice(1).map((line) => (line ? `${indent}${prefix} ${line}` : `${indent}${prefix}`))].join(
    '\n',
  );
}
