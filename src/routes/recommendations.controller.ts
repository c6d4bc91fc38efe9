import { type Request, type Response, Router } from "express";
import type { AuthService } from "../auth/auth.service";
import type { Logger } from "../config/logger";
import { parseLimit, sendError } from "../http/error-response";
import type { RecommendationService } from "../recommendations/recommendation.service";

interface RecommendationsControllerDeps {
  authService: AuthService;
  recommendationService: RecommendationService;
  defaultLimit: number;
  logger: Logger;
}

export function buildRecommendationsController(deps: RecommendationsControllerDeps): Router {
  const router = Router();

  router.get("/", async (request: Request, response: Response) => {
    try {
      const userId = deps.authService.verifyAuthorization(request.header("authorization"));
      const limit = parseLimit(request.query.limit, deps.defaultLimit);
      deps.logger.info("Getting recommendations", { user_id: userId, limit });

      const result = await deps.recommendationService.getRecommendations(userId, limit);
      deps.logger.info("Generated recommendations", { user_id: userId, count: result.recommendations.length });
      response.status(200).json(result);
    } catch (error) {
      sendError(response, error, deps.logger, "recommendations");
    }
  });

  return router;
}
