/**
 * Security Headers Middleware Configuration
 *
 * The service only speaks JSON and plain text, so the policy is the strict
 * API profile: nothing may be loaded, framed or sniffed.
 *
 * Reference: OWASP Security Headers
 * https://owasp.org/www-project-secure-headers/
 */

import helmet from 'helmet';
import { RequestHandler } from 'express';
import { config } from '../config';

export const securityHeaders: RequestHandler = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },

  // HTTP Strict Transport Security - enforces HTTPS in production only
  hsts: config.isProduction
    ? {
        maxAge: 31536000, // 1 year in seconds
        includeSubDomains: true,
      }
    : false,

  frameguard: {
    action: 'deny',
  },

  noSniff: true,

  referrerPolicy: {
    policy: 'no-referrer',
  },
});
