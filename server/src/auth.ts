import type { NextFunction, Request, Response } from "express";
import { SignJWT, jwtVerify } from "jose";
import type { AppConfig } from "./config";
import { UnauthorizedError } from "./errors";
import { logger } from "./logger";
import type { Role, TokenResponse, User } from "./types";

export type Identity = {
  userId: string;
  role?: Role;
};

export type AuthResult =
  | { status: "authenticated"; identity: Identity }
  | { status: "anonymous"; reason: "missing" | "invalid" };

declare global {
  namespace Express {
    interface Request {
      auth?: AuthResult;
    }
  }
}

const ANONYMOUS_MISSING: AuthResult = { status: "anonymous", reason: "missing" };
const ANONYMOUS_INVALID: AuthResult = { status: "anonymous", reason: "invalid" };

const secretKey = (secret: string): Uint8Array => Buffer.from(secret, "utf8");

const isRole = (value: unknown): value is Role => value === "doctor" || value === "patient";

export const issueToken = async (user: User, config: Pick<AppConfig, "jwtSecret" | "jwtExpiresIn">): Promise<string> =>
  new SignJWT({ role: user.role })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(user.id)
    .setIssuedAt()
    .setExpirationTime(config.jwtExpiresIn)
    .sign(secretKey(config.jwtSecret));

export const tokenResponse = async (user: User, config: AppConfig): Promise<TokenResponse> => ({
  access_token: await issueToken(user, config),
  token_type: "Bearer",
  user,
});

/**
 * Turns an Authorization header into an identity. Never throws: a missing
 * header and a bad token both come back as anonymous, with the reason, and
 * each route decides whether anonymous callers may proceed.
 */
export const resolveIdentity = async (header: string | undefined, secret: string): Promise<AuthResult> => {
  if (!header) return ANONYMOUS_MISSING;

  // The auth scheme is case-insensitive (RFC 9110 §11.1).
  const match = /^bearer\s+(.*)$/i.exec(header);
  const token = match?.[1]?.trim();
  if (!token) return ANONYMOUS_INVALID;

  try {
    const { payload } = await jwtVerify(token, secretKey(secret), { algorithms: ["HS256"] });
    if (!payload.sub) return ANONYMOUS_INVALID;
    return {
      status: "authenticated",
      identity: { userId: payload.sub, role: isRole(payload.role) ? payload.role : undefined },
    };
  } catch (err) {
    logger.debug("Bearer token rejected", { reason: err instanceof Error ? err.message : String(err) });
    return ANONYMOUS_INVALID;
  }
};

export const getAuth = (req: Request): AuthResult => req.auth ?? ANONYMOUS_MISSING;

export const identify =
  (config: Pick<AppConfig, "jwtSecret">) => (req: Request, _res: Response, next: NextFunction) => {
    resolveIdentity(req.headers.authorization, config.jwtSecret)
      .then((result) => {
        if (result.status === "anonymous" && result.reason === "invalid") {
          logger.warn("Invalid bearer token; continuing as anonymous", { path: req.originalUrl });
        }
        req.auth = result;
        next();
      })
      .catch(next);
  };

export const requireIdentity = (req: Request, _res: Response, next: NextFunction) => {
  const auth = getAuth(req);
  if (auth.status !== "authenticated") {
    next(new UnauthorizedError(auth.reason === "invalid" ? "Invalid or expired token" : "Authentication required"));
    return;
  }
  next();
};

/** The acting user's id, or the fallback when the caller is anonymous. */
export const actingUserId = (req: Request, fallback: string): string => {
  const auth = getAuth(req);
  return auth.status === "authenticated" ? auth.identity.userId : fallback;
};
