import {
  type CanActivate,
  type ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { JwtService } from "@nestjs/jwt";

import { withTrace } from "../../../common/types/request-context.type";
import jwtConfig from "../../config-management/configs/jwt.config";
import type { AuthenticatedRequest, JwtPayload } from "../types/auth.types";

/**
 * Requires a valid bearer JWT when `AUTH_ENABLED` is true; lets every
 * request through otherwise.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(jwtConfig.KEY)
    private readonly config: ConfigType<typeof jwtConfig>,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (!this.config.enabled) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.logger.warn(
        withTrace(
          request.context,
          `Authentication failed: No token provided from ${request.ip}`,
        ),
      );
      throw new UnauthorizedException("Access token is required");
    }

    try {
      const payload = await this.jwtService.verifyAsync<JwtPayload>(token);

      request.user = payload;

      this.logger.debug(
        withTrace(
          request.context,
          `Authentication successful for user: ${payload.sub || "unknown"}`,
        ),
      );
      return true;
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown error";

      this.logger.warn(
        withTrace(
          request.context,
          `Authentication failed: ${errorMessage} from ${request.ip}`,
        ),
      );

      if (error instanceof Error) {
        if (error.name === "TokenExpiredError") {
          throw new UnauthorizedException("Access token has expired");
        } else if (error.name === "JsonWebTokenError") {
          throw new UnauthorizedException("Invalid access token");
        } else if (error.name === "NotBeforeError") {
          throw new UnauthorizedException("Access token not yet valid");
        }
      }

      throw new UnauthorizedException("Authentication failed");
    }
  }

  private extractTokenFromHeader(
    request: AuthenticatedRequest,
  ): string | undefined {
    const authorization = request.headers.authorization;

    if (!authorization) {
      return undefined;
    }

    const [type, ...rest] = authorization.split(" ");
    const token = rest[rest.length - 1];

    if (type !== "Bearer") {
      this.logger.warn(
        `Invalid authorization header format from ${request.ip}: Expected 'Bearer <token>', got '${type}'`,
      );
      return undefined;
    }

    if (!token || token.trim() === "") {
      this.logger.warn(`Empty token in authorization header from ${request.ip}`);
      return undefined;
    }

    return token;
  }
}
