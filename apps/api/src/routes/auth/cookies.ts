import { COOKIE_NAME, OAUTH_STATE_COOKIE_PREFIX, OAUTH_STATE_MAX_AGE_SECONDS } from '@commerce/auth';
import type { OAuthProviderId } from '@commerce/auth-core';
import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import type { AppSettings } from '../../services/index.js';

export function setSessionCookie(c: Context, token: string, settings: AppSettings) {
  setCookie(c, COOKIE_NAME, token, {
    httpOnly: true,
    secure: settings.secureCookies,
    sameSite: 'Lax',
    maxAge: settings.sessionTtlMinutes * 60, // Matches token exp
    path: '/',
  });
}

export function clearSessionCookie(c: Context, settings: AppSettings) {
  deleteCookie(c, COOKIE_NAME, { path: '/', secure: settings.secureCookies });
}

function stateCookieName(provider: OAuthProviderId): string {
  return `${OAUTH_STATE_COOKIE_PREFIX}${provider}`;
}

/**
 * Apple posts the callback cross-site (form_post), so its state cookie must be
 * SameSite=None, which browsers only accept together with Secure.
 */
export function setStateCookie(
  c: Context,
  provider: OAuthProviderId,
  state: string,
  settings: AppSettings
) {
  const crossSite = provider === 'apple';
  setCookie(c, stateCookieName(provider), state, {
    httpOnly: true,
    secure: crossSite || settings.secureCookies,
    sameSite: crossSite ? 'None' : 'Lax',
    maxAge: OAUTH_STATE_MAX_AGE_SECONDS,
    path: '/api/auth',
  });
}

export function consumeStateCookie(c: Context, provider: OAuthProviderId): string {
  const name = stateCookieName(provider);
  const state = getCookie(c, name) ?? '';
  deleteCookie(c, name, { path: '/api/auth' });
  return state;
}
