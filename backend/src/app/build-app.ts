/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 * - The demo seed never runs in production.
 */

import type { AppConfig } from './config';
import { buildDeps, type InfraOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDemoSeed } from '../shared/db/seed/demo-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: InfraOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  if (config.seed.enabled) {
    const flow = 'seed.demo';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });

      await runDemoSeed({
        db: deps.db,
        userService: deps.users.userService,
        movieService: deps.movies.movieService,
        reviewService: deps.reviews.reviewService,
        demoPassword: config.seed.demoPassword,
      });

      logger.info('seed.done', { flow });
    }
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
