import { escapeHtml } from './html';

export interface LayoutOptions {
  title: string;
  body: string;
  /** Shown in the header with a logout link when present */
  username?: string;
}

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; background: #f6f6f4; color: #222; }
  header { display: flex; justify-content: space-between; align-items: center;
           padding: 0.75rem 1.5rem; background: #1f3a5f; color: #fff; }
  header a { color: #fff; }
  main { max-width: 960px; margin: 1.5rem auto; padding: 0 1.5rem; }
  table { width: 100%; border-collapse: collapse; background: #fff; }
  th, td { padding: 0.5rem 0.75rem; border-bottom: 1px solid #ddd; text-align: left; }
  .error { color: #b00020; }
  form.login { max-width: 320px; display: grid; gap: 0.75rem; }
`;

/** Wraps a page body in the shared dashboard document. `body` is trusted HTML. */
export function renderLayout({ title, body, username }: LayoutOptions): string {
  const account = username
    ? `<span>${escapeHtml(username)} · <a href="/logout">Log out</a></span>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)} · Almanac</title>
  <style>${STYLES}</style>
</head>
<body>
  <header><strong>Almanac</strong>${account}</header>
  <main>
${body}
  </main>
</body>
</html>`;
}
