/** Joins with commas and a final " en " ("a, b en c"); blank items are skipped. */
export function joinDutch(items: string[]): string {
  const kept = items.filter((i) => i.trim() !== "");
  if (kept.length === 0) return "";
  if (kept.length === 1) return kept[0] ?? "";
  return `${kept.slice(0, -1).join(", ")} en ${kept[kept.length - 1]}`;
}

/**
 * dd-mm-yyyy for an ISO date or datetime ("2024-03-05", "2024-03-05T10:00:00Z").
 * Returns undefined when the text does not start with an ISO date.
 */
export function formatDateNl(iso: string | undefined): string | undefined {
  if (!iso) return undefined;
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(iso.trim());
  if (!match) return undefined;
  const [, year, month, day] = match;
  return `${day}-${month}-${year}`;
}

