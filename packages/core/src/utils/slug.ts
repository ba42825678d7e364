const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Derives a task slug from a free-text title.
 * Lower-cases, folds accents to ASCII and joins the remaining alphanumeric
 * runs with single hyphens.
 *
 * @example
 * slugify('Go for a Walk!') // 'go-for-a-walk'
 * slugify('Café  au lait') // 'cafe-au-lait'
 */
export function slugify(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Checks that a slug is lowercase ASCII, hyphen-separated and
 * URL/filename safe.
 */
export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}
