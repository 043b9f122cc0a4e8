const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function levelClass(line: string): string {
  if (line.includes('[ERROR]') || line.includes('[FATAL]')) return 'error';
  if (line.includes('[WARN]')) return 'warn';
  return 'info';
}

/**
 * Log viewer page, newest line first
 */
export function renderLogsPage(lines: readonly string[]): string {
  const rows = [...lines]
    .reverse()
    .map((line) => `<div class="log-line ${levelClass(line)}">${escapeHtml(line)}</div>`)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>candlevault logs</title>
<style>
body { font-family: ui-monospace, monospace; background: #111; color: #ddd; margin: 1rem; }
.log-line { white-space: pre-wrap; padding: 2px 0; border-bottom: 1px solid #222; }
.warn { color: #e0b34a; }
.error { color: #ef6b6b; }
</style>
</head>
<body>
<h1>Recent logs (${lines.length})</h1>
${rows}
</body>
</html>
`;
}
