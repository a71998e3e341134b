export { renderLoginPage } from './login.view';
export { renderMonthsPage } from './months.view';
export { renderMonthDetailPage } from './month-detail.view';
