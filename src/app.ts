import express, { type Express, type Request, type Response } from "express";
import { AuthService } from "./auth/auth.service";
import type { EnvConfig } from "./config/env";
import { createLogger, type Logger } from "./config/logger";
import { ApplicationsRepository } from "./db/repositories/applications.repo";
import { BehaviorsRepository } from "./db/repositories/behaviors.repo";
import { CandidatesRepository } from "./db/repositories/candidates.repo";
import { InternshipsRepository } from "./db/repositories/internships.repo";
import { type RestReader, SupabaseRestClient } from "./db/supabase.client";
import { buildCorsMiddleware } from "./http/cors.middleware";
import { buildRequestLoggingMiddleware } from "./http/request-logging.middleware";
import { type InsightsDataSource, StaticInsightsDataSource } from "./insights/insights-data-source";
import { InsightsService } from "./insights/insights.service";
import { UpstreamClient } from "./proxy/upstream.client";
import { type ProfileStore, RepositoryProfileStore } from "./recommendations/profile-store";
import { RecommendationService } from "./recommendations/recommendation.service";
import { buildAuthController } from "./routes/auth.controller";
import { buildInsightsController } from "./routes/insights.controller";
import { buildProxyController } from "./routes/proxy.controller";
import { buildRecommendationsController } from "./routes/recommendations.controller";

export const SERVICE_NAME = "recommendation-gateway";

export interface AppOverrides {
  logger?: Logger;
  restReader?: RestReader;
  profileStore?: ProfileStore;
  insightsDataSource?: InsightsDataSource;
}

export interface AppContext {
  app: Express;
  logger: Logger;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  const restReader =
    overrides.restReader ??
    (env.supabaseUrl && env.supabaseApiKey
      ? new SupabaseRestClient({
          url: env.supabaseUrl,
          serviceRoleKey: env.supabaseApiKey,
        })
      : undefined);
  if (!restReader) {
    logger.warn("Supabase is not configured, store reads return no data");
  }

  const candidatesRepository = new CandidatesRepository(logger, restReader);
  const internshipsRepository = new InternshipsRepository(logger, restReader);
  const behaviorsRepository = new BehaviorsRepository(logger, restReader);
  const applicationsRepository = new ApplicationsRepository(logger, restReader);

  const authService = new AuthService(
    candidatesRepository,
    { jwtSecret: env.jwtSecret, tokenTtlHours: env.jwtTtlHours },
    logger,
  );
  const profileStore =
    overrides.profileStore ?? new RepositoryProfileStore(candidatesRepository, internshipsRepository);
  const recommendationService = new RecommendationService(profileStore, logger);
  const insightsService = new InsightsService(
    behaviorsRepository,
    applicationsRepository,
    overrides.insightsDataSource ?? new StaticInsightsDataSource(),
    logger,
  );
  const upstreamClient = new UpstreamClient(
    { baseUrl: env.upstreamApiUrl, timeoutMs: env.upstreamTimeoutMs },
    logger,
  );

  app.use(buildRequestLoggingMiddleware(logger));
  app.use(buildCorsMiddleware());

  // Raw bodies for the proxy; everything else gets parsed JSON.
  app.use("/proxy", buildProxyController({ upstreamClient, logger }));
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/auth", buildAuthController({ authService, logger }));
  app.use(
    "/recommendations",
    buildRecommendationsController({
      authService,
      recommendationService,
      defaultLimit: env.recommendationsDefaultLimit,
      logger,
    }),
  );
  app.use(
    buildInsightsController({
      authService,
      insightsService,
      trendingSkillsDefaultLimit: env.trendingSkillsDefaultLimit,
      logger,
    }),
  );

  return { app, logger };
}
