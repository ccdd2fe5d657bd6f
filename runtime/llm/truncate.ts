export function truncate(text: string, delimiters: Iterable<string>): string {
  let cutAt = -1;
  for (const delimiter of delimiters) {
    if (delimiter === "") {
      continue;
    }
    const index = text.indexOf(delimiter);
    if (index !== -1 && (cutAt === -1 || index < cutAt)) {
      cutAt = index;
    }
  }
  return cutAt === -1 ? text : text.slice(0, cutAt);
}
