import bcrypt from "bcryptjs";
import type { Logger } from "../config/logger";
import type { CandidatesRepository } from "../db/repositories/candidates.repo";
import { UnauthorizedError, errorMessage } from "../shared/errors";
import type { CandidateAccount } from "../shared/types/domain.types";
import { extractBearerToken, issueAccessToken, verifyAccessToken } from "./access-token";

export interface UserInfo {
  id: number;
  email: string;
  name: string;
  education: string | null;
  skills: string | null;
  location: string | null;
  experience_years: number;
  phone: string | null;
  linkedin: string | null;
  github: string | null;
}

export interface LoginResponse {
  success: boolean;
  token: string;
  user: UserInfo;
  message: string;
}

export interface RefreshResponse {
  success: boolean;
  token: string;
  message: string;
}

export interface AuthServiceOptions {
  jwtSecret: string;
  tokenTtlHours: number;
}

export class AuthService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly options: AuthServiceOptions,
    private readonly logger: Logger,
  ) {}

  async login(email: string, password: string): Promise<LoginResponse> {
    const account = await this.candidatesRepository.getAccountByEmail(email.trim());
    if (!account) {
      throw new UnauthorizedError("Invalid credentials");
    }
    if (!(await verifyPassword(password, account.passwordHash, this.logger))) {
      throw new UnauthorizedError("Invalid credentials");
    }

    return {
      success: true,
      token: this.issueToken(account.id, account.email),
      user: toUserInfo(account),
      message: "Login successful",
    };
  }

  async refreshToken(authorizationHeader: string | undefined): Promise<RefreshResponse> {
    const userId = this.verifyAuthorization(authorizationHeader);
    const account = await this.candidatesRepository.getAccountById(userId);
    if (!account) {
      throw new UnauthorizedError("Unknown user");
    }
    return {
      success: true,
      token: this.issueToken(userId, account.email),
      message: "Token refreshed successfully",
    };
  }

  verifyAuthorization(authorizationHeader: string | undefined): number {
    const token = extractBearerToken(authorizationHeader);
    if (!token) {
      throw new UnauthorizedError("Missing authorization header");
    }
    const claims = verifyAccessToken(token, this.options.jwtSecret);
    if (!claims) {
      throw new UnauthorizedError("Invalid or expired token");
    }
    this.logger.debug("auth.token_verified", { user_id: claims.user_id });
    return claims.user_id;
  }

  private issueToken(userId: number, email: string): string {
    return issueAccessToken({
      secret: this.options.jwtSecret,
      ttlSeconds: this.options.tokenTtlHours * 3600,
      userId,
      email,
    });
  }
}

async function verifyPassword(password: string, hash: string, logger: Logger): Promise<boolean> {
  try {
    return await bcrypt.compare(password, hash);
  } catch (error) {
    logger.warn("auth.password_hash_unreadable", { error: errorMessage(error) });
    return false;
  }
}

function toUserInfo(account: CandidateAccount): UserInfo {
  return {
    id: account.id,
    email: account.email,
    name: account.name,
    education: account.education ?? null,
    skills: account.skills ?? null,
    location: account.location ?? null,
    experience_years: account.experienceYears,
    phone: account.phone ?? null,
    linkedin: account.linkedin ?? null,
    github: account.github ?? null,
  };
}
