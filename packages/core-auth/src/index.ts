/**
 * JWT authentication for the wheel API.
 *
 * Every protected request carries `Authorization: Bearer <token>`. The token
 * subject is the caller identity the engine authorizes against (organizer or
 * winner); the `currency` claim scopes the caller's custody wallet.
 *
 * @module @prize-wheel/core-auth
 */

import {
  CanActivate,
  ExecutionContext,
  Global,
  Inject,
  Injectable,
  Logger,
  Module,
  UnauthorizedException,
  createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";
import * as jwt from "jsonwebtoken";

export interface AuthContext {
  userId: string;
  currency: string;
  metadata?: Record<string, unknown>;
}

export interface IAuthPort {
  verifyToken(token: string): Promise<AuthContext>;
}

export interface JwtAuthPortOptions {
  algorithm: "HS256" | "RS256";
  secret?: string; // HS256
  publicKey?: string; // RS256, PEM or base64 PEM
  issuer?: string;
  audience?: string;
}

export interface UnauthenticatedPayload {
  error: "UNAUTHENTICATED";
  message: string;
}

export const AUTH_PORT = Symbol("AUTH_PORT");
export const AUTH_CONTEXT_REQUEST_KEY = "authContext";

const STANDARD_CLAIMS = ["sub", "iat", "exp", "nbf", "iss", "aud", "jti", "currency"];

export function unauthenticated(message: string): UnauthorizedException {
  const payload: UnauthenticatedPayload = { error: "UNAUTHENTICATED", message };
  return new UnauthorizedException(payload);
}

function decodeKey(key: string): string {
  return key.includes("-----BEGIN") ? key : Buffer.from(key, "base64").toString("utf-8");
}

/**
 * Reads AUTH_JWT_ALGO, AUTH_JWT_SECRET, AUTH_JWT_PUBLIC_KEY, AUTH_JWT_ISSUER and
 * AUTH_JWT_AUDIENCE when no options are passed.
 */
export function jwtOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): JwtAuthPortOptions {
  const algorithm = (env.AUTH_JWT_ALGO ?? "HS256").toUpperCase();
  if (algorithm !== "HS256" && algorithm !== "RS256") {
    throw new Error(`Unsupported JWT algorithm: ${algorithm}. Supported: HS256, RS256`);
  }
  return {
    algorithm,
    secret: env.AUTH_JWT_SECRET,
    publicKey: env.AUTH_JWT_PUBLIC_KEY,
    issuer: env.AUTH_JWT_ISSUER,
    audience: env.AUTH_JWT_AUDIENCE,
  };
}

export class JwtAuthPort implements IAuthPort {
  private readonly logger = new Logger(JwtAuthPort.name);
  private readonly algorithm: "HS256" | "RS256";
  private readonly secretOrPublicKey: string;
  private readonly issuer?: string;
  private readonly audience?: string;

  constructor(options: JwtAuthPortOptions = jwtOptionsFromEnv()) {
    this.algorithm = options.algorithm;
    if (this.algorithm === "HS256") {
      if (!options.secret) {
        throw new Error("AUTH_JWT_SECRET is required for HS256 algorithm");
      }
      this.secretOrPublicKey = options.secret;
    } else {
      if (!options.publicKey) {
        throw new Error("AUTH_JWT_PUBLIC_KEY is required for RS256 algorithm");
      }
      this.secretOrPublicKey = decodeKey(options.publicKey);
    }
    this.issuer = options.issuer;
    this.audience = options.audience;
  }

  async verifyToken(token: string): Promise<AuthContext> {
    if (!token) {
      throw unauthenticated("Missing authorization token");
    }
    const cleanToken = token.replace(/^Bearer\s+/i, "");

    let decoded: string | jwt.JwtPayload;
    try {
      const verifyOptions: jwt.VerifyOptions = { algorithms: [this.algorithm] };
      if (this.issuer) {
        verifyOptions.issuer = this.issuer;
      }
      if (this.audience) {
        verifyOptions.audience = this.audience;
      }
      decoded = jwt.verify(cleanToken, this.secretOrPublicKey, verifyOptions);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw unauthenticated("Token has expired");
      }
      if (error instanceof jwt.NotBeforeError) {
        throw unauthenticated(`Token not yet valid: ${error.message}`);
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw unauthenticated(`Invalid token: ${error.message}`);
      }
      this.logger.error("JWT verification error", error);
      throw unauthenticated("Token verification failed");
    }

    if (typeof decoded === "string") {
      throw unauthenticated("Token payload must be a JSON object");
    }
    const userId: unknown = decoded.sub;
    const currency: unknown = decoded["currency"];
    if (typeof userId !== "string" || userId.trim() === "") {
      throw unauthenticated("JWT missing required claim: sub");
    }
    if (typeof currency !== "string" || currency.trim() === "") {
      throw unauthenticated("JWT missing required claim: currency");
    }

    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(decoded)) {
      if (!STANDARD_CLAIMS.includes(key)) {
        metadata[key] = value;
      }
    }

    return {
      userId,
      currency,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    };
  }
}

type AuthenticatedRequest = Request & { [AUTH_CONTEXT_REQUEST_KEY]?: AuthContext };

/**
 * Verifies the bearer token and attaches the AuthContext to the request.
 * Health and metrics stay public.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private static readonly PUBLIC_ROUTES = [
    { method: "GET", path: /^\/wheels\/health$/ },
    { method: "GET", path: /^\/metrics$/ },
  ];

  constructor(@Inject(AUTH_PORT) private readonly authPort: IAuthPort) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (this.isPublicRoute(request)) {
      return true;
    }

    const token = this.extractToken(request);
    if (!token) {
      throw unauthenticated("Missing authorization token. Provide Authorization: Bearer <token> header.");
    }

    request[AUTH_CONTEXT_REQUEST_KEY] = await this.authPort.verifyToken(token);
    return true;
  }

  private isPublicRoute(request: Request): boolean {
    return AuthGuard.PUBLIC_ROUTES.some((route) => route.method === request.method && route.path.test(request.path));
  }

  private extractToken(request: Request): string | null {
    const header = request.headers["authorization"];
    if (!header) return null;
    const value = Array.isArray(header) ? header[0] : header;
    return value || null;
  }
}

export const Auth = createParamDecorator((_data: unknown, ctx: ExecutionContext): AuthContext => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  const authContext = request[AUTH_CONTEXT_REQUEST_KEY];
  if (!authContext) {
    throw unauthenticated("Auth context missing in request. Ensure AuthGuard is applied to this route.");
  }
  return authContext;
});

@Global()
@Module({
  providers: [
    {
      provide: AUTH_PORT,
      useFactory: (): IAuthPort => {
        const logger = new Logger("AuthModule");
        try {
          return new JwtAuthPort();
        } catch (error: unknown) {
          logger.error("Failed to initialize JwtAuthPort. Check AUTH_JWT_* environment variables.", error);
          throw error;
        }
      },
    },
    AuthGuard,
  ],
  exports: [AUTH_PORT, AuthGuard],
})
export class AuthModule {}

export * from "./test-utils";
