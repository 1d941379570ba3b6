const DECLARATION_RE = /(--[\w-]+)\s*:/g;
const REFERENCE_RE = /var\(\s*(--[\w-]+)/g;

function collect(css: string, re: RegExp): Set<string> {
  const names = new Set<string>();
  for (const match of css.matchAll(re)) {
    names.add(match[1]);
  }
  return names;
}

export function collectDeclaredProperties(css: string): Set<string> {
  return collect(css, DECLARATION_RE);
}

export function collectReferencedProperties(css: string): Set<string> {
  return collect(css, REFERENCE_RE);
}

/**
 * Custom properties used through `var()` that no rule in the sheet declares.
 * The browser would substitute the initial value for these without complaint.
 */
export function findUnresolvedProperties(css: string): string[] {
  const declared = collectDeclaredProperties(css);
  return [...collectReferencedProperties(css)]
    .filter((name) => !declared.has(name))
    .sort();
}

export function renderThemeBlock(selector: string, declarations: string): string {
  return `${selector}{${declarations}}`;
}
