const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

export const escapeHtml = (text: string): string => text.replace(/[&<>]/g, (char) => HTML_ESCAPES[char] ?? char);

export const wrapPage = (header: string, body: string, footer: string): string => header + body + footer;
