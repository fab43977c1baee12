/**
 * Dataset id helpers.
 */

const HEX_ID_PATTERN = /([0-9a-f]{32})$/i;

/**
 * Formats 32 hex characters as a hyphenated id (8-4-4-4-12).
 */
export const formatDatasetId = (hex: string): string =>
  [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');

/**
 * Extracts the dataset id from a share URL such as
 * `https://www.notion.so/workspace/Tasks-0123456789abcdef0123456789abcdef?v=...`.
 * The `v` query parameter names a view, not the dataset, so it is ignored.
 *
 * @returns The hyphenated id, or null when the path does not end in one
 */
export const extractDatasetIdFromUrl = (url: string): string | null => {
  const path = url.trim().split(/[?#]/, 1)[0] ?? '';
  const match = HEX_ID_PATTERN.exec(path.replaceAll('-', ''));
  const hex = match?.[1];
  return hex !== undefined ? formatDatasetId(hex.toLowerCase()) : null;
};
