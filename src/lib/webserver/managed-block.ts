/**
 * Managed configuration blocks
 *
 * certsmith only ever rewrites the region between its own begin/end markers;
 * everything else in a configuration file is preserved byte for byte.
 */

export function beginMarker(id: string, comment = '#'): string {
  return `${comment} certsmith:begin ${id}`;
}

export function endMarker(id: string, comment = '#'): string {
  return `${comment} certsmith:end ${id}`;
}

/** Replace the block for `id` in `existing`, or append it when absent. */
export function mergeManagedBlock(existing: string | undefined, id: string, body: string, comment = '#'): string {
  const begin = beginMarker(id, comment);
  const end = endMarker(id, comment);
  const block = `${begin}\n${body.endsWith('\n') ? body : `${body}\n`}${end}\n`;

  if (!existing) return block;

  const start = existing.indexOf(begin);
  const stop = start === -1 ? -1 : existing.indexOf(end, start);
  if (start !== -1 && stop !== -1) {
    let after = stop + end.length;
    if (existing[after] === '\n') after += 1;
    return existing.slice(0, start) + block + existing.slice(after);
  }

  const separator = existing.endsWith('\n') ? '\n' : '\n\n';
  return existing + separator + block;
}
