import { escapeHtml } from './html';
import { renderLayout } from './layout.view';

export interface LoginViewModel {
  error?: string;
  username?: string;
}

export function renderLoginPage({ error, username }: LoginViewModel = {}): string {
  const errorLine = error
    ? `<p class="error" role="alert">${escapeHtml(error)}</p>`
    : '';

  const body = `    <h1>Sign in</h1>
    ${errorLine}
    <form class="login" method="post" action="/login">
      <label>Username <input name="username" autocomplete="username" value="${escapeHtml(username ?? '')}" required></label>
      <label>Password <input name="password" type="password" autocomplete="current-password" required></label>
      <button type="submit">Sign in</button>
    </form>`;

  return renderLayout({ title: 'Sign in', body });
}
