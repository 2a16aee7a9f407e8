/**
 * Package tokens from a list file, in file order. Blank lines and lines whose
 * first non-whitespace character is `#` are skipped; duplicates are kept.
 */
export function parsePackageList(text: string): string[] {
  const packages: string[] = [];
  for (const line of text.split("\n")) {
    const token = line.trim();
    if (token === "" || token.startsWith("#")) continue;
    packages.push(token);
  }
  return packages;
}
