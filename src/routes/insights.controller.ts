import { type Request, type Response, Router } from "express";
import type { AuthService } from "../auth/auth.service";
import type { Logger } from "../config/logger";
import { parseLimit, sendError } from "../http/error-response";
import type { InsightsService } from "../insights/insights.service";

interface InsightsControllerDeps {
  authService: AuthService;
  insightsService: InsightsService;
  trendingSkillsDefaultLimit: number;
  logger: Logger;
}

export function buildInsightsController(deps: InsightsControllerDeps): Router {
  const router = Router();

  router.get("/user-insights", async (request: Request, response: Response) => {
    try {
      const userId = deps.authService.verifyAuthorization(request.header("authorization"));
      response.status(200).json(await deps.insightsService.getUserInsights(userId));
    } catch (error) {
      sendError(response, error, deps.logger, "insights.user");
    }
  });

  router.get("/market-insights", async (_request: Request, response: Response) => {
    try {
      response.status(200).json(await deps.insightsService.getMarketInsights());
    } catch (error) {
      sendError(response, error, deps.logger, "insights.market");
    }
  });

  router.get("/collaborative-insights", async (_request: Request, response: Response) => {
    try {
      response.status(200).json(await deps.insightsService.getCollaborativeInsights());
    } catch (error) {
      sendError(response, error, deps.logger, "insights.collaborative");
    }
  });

  router.get("/trending-skills", async (request: Request, response: Response) => {
    try {
      const limit = parseLimit(request.query.limit, deps.trendingSkillsDefaultLimit);
      response.status(200).json(await deps.insightsService.getTrendingSkills(limit));
    } catch (error) {
      sendError(response, error, deps.logger, "insights.trending_skills");
    }
  });

  return router;
}
