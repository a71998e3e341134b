import type { Event, Month } from '@almanac/database';
import { escapeHtml } from './html';
import { renderLayout } from './layout.view';

export interface MonthDetailViewModel {
  username: string;
  month: Month;
}

function renderEvent(event: Event): string {
  const details = event.details
    .map((detail) => `<li>${escapeHtml(detail.detail)}</li>`)
    .join('');

  return `      <tr>
        <td>${escapeHtml(event.day)}</td>
        <td><ul>${details}</ul></td>
      </tr>`;
}

export function renderMonthDetailPage({
  username,
  month,
}: MonthDetailViewModel): string {
  const title = `${month.monthBn} (${month.monthEn})`;

  const events =
    month.events.length === 0
      ? '<p>No events in this month.</p>'
      : `<table>
      <thead><tr><th>Day</th><th>Details</th></tr></thead>
      <tbody>
${month.events.map(renderEvent).join('\n')}
      </tbody>
    </table>`;

  const body = `    <p><a href="/dashboard">← All months</a></p>
    <h1>${escapeHtml(title)}</h1>
    ${events}`;

  return renderLayout({ title, body, username });
}
