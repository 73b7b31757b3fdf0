// Canonical project name: lowercase, runs of "-", "_" and "." collapse to "-".
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

