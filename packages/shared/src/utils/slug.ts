// Filesystem-safe slug utilities

/**
 * Generate a URL- and filesystem-safe slug from arbitrary text.
 * Accented letters are reduced to their base letter first.
 */
export function generateSlug(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // Drop combining marks
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ') // Special chars become separators
    .trim()
    .replace(/\s+/g, '-') // Spaces to hyphens
    .replace(/-+/g, '-') // Collapse multiple hyphens
    .replace(/^-|-$/g, ''); // Trim leading/trailing hyphens
}
