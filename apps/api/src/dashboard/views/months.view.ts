import type { Month } from '@almanac/database';
import { escapeHtml } from './html';
import { renderLayout } from './layout.view';

export interface MonthsViewModel {
  username: string;
  months: Month[];
}

export function renderMonthsPage({ username, months }: MonthsViewModel): string {
  const rows = months
    .map(
      (month) => `      <tr>
        <td><a href="/dashboard/months/${month.id}">${escapeHtml(month.monthBn)}</a></td>
        <td>${escapeHtml(month.monthEn)}</td>
        <td>${month.events.length}</td>
      </tr>`,
    )
    .join('\n');

  const table =
    months.length === 0
      ? '<p>No months yet.</p>'
      : `<table>
      <thead><tr><th>Month</th><th>English</th><th>Events</th></tr></thead>
      <tbody>
${rows}
      </tbody>
    </table>`;

  const body = `    <h1>Months</h1>
    ${table}`;

  return renderLayout({ title: 'Months', body, username });
}
