import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import hpp from 'hpp';
import type { AppConfig } from '../core/config.js';

export function applySecurity(app: Express, corsOrigin: AppConfig['corsOrigin']) {
  app.use(
    helmet({
      // JSON only; nothing here is rendered by a browser beyond the index
      contentSecurityPolicy:
        process.env.NODE_ENV === 'production'
          ? {
              useDefaults: true,
              directives: {
                'default-src': ["'none'"],
                'frame-ancestors': ["'none'"],
                'base-uri': ["'none'"],
              },
            }
          : false,
      frameguard: { action: 'deny' },
      referrerPolicy: { policy: 'no-referrer' },
      crossOriginEmbedderPolicy: false,
    }),
  );
  app.use(hpp());
  if (corsOrigin !== undefined) {
    app.use(
      cors({
        origin: corsOrigin,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Client-ID', 'X-Request-ID'],
        exposedHeaders: ['X-Request-ID', 'Retry-After'],
      }),
    );
  }
}
