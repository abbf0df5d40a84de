export const AUTH_COOKIE_NAME = 'blog_session';
