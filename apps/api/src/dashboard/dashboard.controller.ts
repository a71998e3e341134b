import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  ParseIntPipe,
  Res,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import type { User } from '@almanac/database';
import {
  AuthService,
  SessionCookieGuard,
  SessionUser,
  SESSION_COOKIE_NAME,
  BEARER_PREFIX,
} from '../auth';
import { CalendarService } from '../calendar/calendar.service';
import { MAX_PAGE_SIZE } from '../calendar/calendar.constants';
import {
  renderLoginPage,
  renderMonthsPage,
  renderMonthDetailPage,
} from './views';

const LOGIN_PATH = '/login';
const DASHBOARD_PATH = '/dashboard';

function formText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * DashboardController — server-rendered admin pages.
 *
 * Routes:
 *   GET  /                       → redirect to /dashboard
 *   GET  /login                  → login form
 *   POST /login                  → set session cookie, 303 to /dashboard
 *   GET  /logout                 → clear session cookie, 303 to /login
 *   GET  /dashboard              → months overview (session required)
 *   GET  /dashboard/months/:id   → one month (session required)
 *
 * Anonymous visitors are redirected to the login page rather than refused.
 */
@Controller()
export class DashboardController {
  constructor(
    private readonly authService: AuthService,
    private readonly calendarService: CalendarService,
  ) {}

  @Get()
  root(@Res() res: Response): void {
    res.redirect(HttpStatus.FOUND, DASHBOARD_PATH);
  }

  @Get('login')
  loginPage(@Res() res: Response): void {
    res.type('html').send(renderLoginPage());
  }

  /**
   * Reads the two fields individually, so browser extras such as a submit
   * button's name pass the global whitelist. Missing or non-string values
   * count as empty and fail the credential check.
   */
  @Post('login')
  async login(
    @Body('username') usernameField: unknown,
    @Body('password') passwordField: unknown,
    @Res() res: Response,
  ): Promise<void> {
    const username = formText(usernameField);
    const user = await this.authService.verifyCredentials(
      username,
      formText(passwordField),
    );

    if (!user) {
      res
        .status(HttpStatus.OK)
        .type('html')
        .send(renderLoginPage({ error: 'Invalid credentials', username }));
      return;
    }

    const token = await this.authService.issueSessionToken(user);

    res.cookie(SESSION_COOKIE_NAME, `${BEARER_PREFIX}${token}`, {
      httpOnly: true,
      sameSite: 'lax',
      path: '/',
    });

    res.redirect(HttpStatus.SEE_OTHER, DASHBOARD_PATH);
  }

  @Get('logout')
  logout(@Res() res: Response): void {
    res.clearCookie(SESSION_COOKIE_NAME, { path: '/' });
    res.redirect(HttpStatus.SEE_OTHER, LOGIN_PATH);
  }

  @Get('dashboard')
  @UseGuards(SessionCookieGuard)
  async months(
    @SessionUser() user: User | null,
    @Res() res: Response,
  ): Promise<void> {
    if (!user) {
      res.redirect(HttpStatus.FOUND, LOGIN_PATH);
      return;
    }

    const months = await this.calendarService.listMonths(0, MAX_PAGE_SIZE);

    res
      .type('html')
      .send(renderMonthsPage({ username: user.username, months }));
  }

  @Get('dashboard/months/:id')
  @UseGuards(SessionCookieGuard)
  async monthDetail(
    @Param('id', ParseIntPipe) monthId: number,
    @SessionUser() user: User | null,
    @Res() res: Response,
  ): Promise<void> {
    if (!user) {
      res.redirect(HttpStatus.FOUND, LOGIN_PATH);
      return;
    }

    const month = await this.calendarService.getMonth(monthId);

    if (!month) {
      res.redirect(HttpStatus.FOUND, DASHBOARD_PATH);
      return;
    }

    res
      .type('html')
      .send(renderMonthDetailPage({ username: user.username, month }));
  }
}
