// ============================================
// CHARACTER TRUNCATION
// ============================================

export const MAX_RESPONSE_LENGTH = 100000; // ~25k tokens (4 chars per token average)

export function truncateResponse(
  text: string,
  maxLength: number = MAX_RESPONSE_LENGTH
): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.slice(0, maxLength);
  const originalLength = text.length;
  const truncatedChars = originalLength - maxLength;

  return (
    truncated +
    '\n\n' +
    '─────────────────────────────────────────\n' +
    `⚠️  RESPONSE TRUNCATED\n` +
    `Original length: ${originalLength} characters\n` +
    `Truncated: ${truncatedChars} characters\n\n` +
    `💡 To reduce response size:\n` +
    `   • Query a single list with get_cards (list_id) instead of a whole board\n` +
    `   • Pass board_ids or a lower limit to search_cards\n` +
    '─────────────────────────────────────────'
  );
}

// ============================================
// RESPONSE FORMAT CONVERSION
// ============================================

export type ResponseFormat = 'json' | 'markdown';

export function isResponseFormat(value: unknown): value is ResponseFormat {
  return value === 'json' || value === 'markdown';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLabel(key: string): string {
  return key.replace(/_/g, ' ').replace(/\b\w/g, (l) => l.toUpperCase());
}

function formatScalar(value: unknown): string {
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  return String(value);
}

// Convert JSON to formatted markdown
export function formatAsMarkdown(data: unknown, title?: string): string {
  if (typeof data === 'string') {
    return data; // Already markdown
  }

  let markdown = '';

  if (title) {
    markdown += `# ${title}\n\n`;
  }

  if (Array.isArray(data)) {
    return markdown + formatArrayAsMarkdown(data, 0);
  }

  if (isRecord(data)) {
    return markdown + formatObjectAsMarkdown(data, 0);
  }

  return markdown + formatScalar(data);
}

function formatArrayAsMarkdown(items: unknown[], depth: number): string {
  const indent = '  '.repeat(depth);
  let markdown = '';

  for (const item of items) {
    if (isRecord(item)) {
      const { name, id, ...rest } = item;
      const heading = name !== undefined ? `**${formatScalar(name)}**` : 'Item';
      markdown += `${indent}• ${heading}${id !== undefined ? ` (\`${formatScalar(id)}\`)` : ''}\n`;
      markdown += formatObjectAsMarkdown(rest, depth + 1);
    } else {
      markdown += `${indent}• ${formatScalar(item)}\n`;
    }
  }

  return markdown;
}

function formatObjectAsMarkdown(obj: Record<string, unknown>, depth: number): string {
  const indent = '  '.repeat(depth);
  let markdown = '';

  for (const [key, value] of Object.entries(obj)) {
    if (value === null || value === undefined) continue;

    const label = toLabel(key);

    if (Array.isArray(value)) {
      if (value.length === 0) continue;
      if (value.some(isRecord)) {
        markdown += `${indent}**${label} (${value.length}):**\n`;
        markdown += formatArrayAsMarkdown(value, depth + 1);
      } else {
        markdown += `${indent}**${label}:** ${value.map(formatScalar).join(', ')}\n`;
      }
    } else if (isRecord(value)) {
      markdown += `${indent}**${label}:**\n`;
      markdown += formatObjectAsMarkdown(value, depth + 1);
    } else {
      markdown += `${indent}**${label}:** ${formatScalar(value)}\n`;
    }
  }

  return markdown;
}

// Apply format conversion
export function applyResponseFormat(
  data: unknown,
  format: ResponseFormat = 'markdown',
  title?: string
): string {
  if (format === 'markdown') {
    return formatAsMarkdown(data, title);
  }

  return JSON.stringify(data, null, 2);
}
