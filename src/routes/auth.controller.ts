import { type Request, type Response, Router } from "express";
import type { AuthService } from "../auth/auth.service";
import type { Logger } from "../config/logger";
import { sendError } from "../http/error-response";
import { UnauthorizedError, errorMessage } from "../shared/errors";

interface AuthControllerDeps {
  authService: AuthService;
  logger: Logger;
}

export function buildAuthController(deps: AuthControllerDeps): Router {
  const router = Router();

  router.post("/login", async (request: Request, response: Response) => {
    const email = typeof request.body?.email === "string" ? request.body.email : "";
    const password = typeof request.body?.password === "string" ? request.body.password : "";
    deps.logger.info("Login attempt", { email });

    try {
      if (!email || !password) {
        throw new UnauthorizedError("Email and password are required");
      }
      const result = await deps.authService.login(email, password);
      deps.logger.info("Login successful", { email, user_id: result.user.id });
      response.status(200).json(result);
    } catch (error) {
      // Every login failure is reported as 401.
      sendError(response, asUnauthorized(error, deps.logger, "Invalid credentials"), deps.logger, "auth.login");
    }
  });

  router.post("/refresh", async (request: Request, response: Response) => {
    try {
      const result = await deps.authService.refreshToken(request.header("authorization"));
      response.status(200).json(result);
    } catch (error) {
      sendError(response, asUnauthorized(error, deps.logger, "Token refresh failed"), deps.logger, "auth.refresh");
    }
  });

  return router;
}

function asUnauthorized(error: unknown, logger: Logger, message: string): UnauthorizedError {
  if (error instanceof UnauthorizedError) {
    return error;
  }
  logger.error("Authentication backend failure", { error: errorMessage(error) });
  return new UnauthorizedError(message);
}
