import type { Server } from 'node:http';
import express from 'express';
import cors from 'cors';
import { createLogger } from './utils/logger.js';
import type { ScheduleService } from './core/schedule/ScheduleService.js';
import type { UserProfileRepository } from './persistence/repositories/UserProfileRepository.js';
import type { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { createWebhookRouter } from './adapters/telegram/webhookRouter.js';
import { createScheduleRouter } from './routes/scheduleRouter.js';
import { createUserRouter } from './routes/userRouter.js';
import { createAuthRouter } from './routes/authRouter.js';
import { errorHandler } from './routes/http.js';

const logger = createLogger({ component: 'server' });

/** Local front-end dev servers and the Telegram web clients hosting the Mini App. */
export const DEFAULT_CORS_ORIGINS = [
  'http://localhost:8001',
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173',
  'http://localhost:8000',
  'http://127.0.0.1:8000',
  'https://web.telegram.org',
  'https://t.me',
  'https://telegram.org',
];

export interface AppDependencies {
  schedule: ScheduleService;
  users: UserProfileRepository;
  telegram?: TelegramAdapter;
  botToken?: string;
  corsOrigins?: string[];
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(
    cors({
      origin: [...DEFAULT_CORS_ORIGINS, ...(deps.corsOrigins ?? [])],
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
    })
  );
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use(createScheduleRouter(deps.schedule));
  app.use('/user', createUserRouter(deps.users));
  app.use('/auth', createAuthRouter(deps.users, deps.botToken));
  if (deps.telegram) {
    app.use('/webhook', createWebhookRouter(deps.telegram));
  }

  app.use(errorHandler);
  return app;
}

export async function startServer(app: express.Express, port: number, host: string = '127.0.0.1'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
