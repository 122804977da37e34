import type { NextFunction, Request, Response } from "express";
import type { CorsConfig } from "./types.js";

const ALLOWED_METHODS = "GET, POST, PUT, PATCH, DELETE, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, X-Trace-Id";

type OriginMatcher = (origin: string) => boolean;

function stripSlash(origin: string): string {
  return origin.replace(/\/$/, "");
}

function hostnameOf(origin: string): string | undefined {
  try {
    return new URL(origin).hostname;
  } catch {
    return undefined;
  }
}

/**
 * `*` matches anything, `*.example.com` any host under example.com,
 * anything else the exact origin.
 */
function compilePattern(pattern: string): OriginMatcher {
  if (pattern === "*") return () => true;
  if (pattern.startsWith("*.")) {
    const suffix = pattern.slice(1);
    return (origin) => hostnameOf(origin)?.endsWith(suffix) ?? false;
  }
  const exact = stripSlash(pattern);
  return (origin) => origin === exact;
}

function configuredOrigins(config: CorsConfig): string[] {
  if (config.origins && config.origins.length > 0) return config.origins;
  const fromEnv = process.env.CORS_ALLOWED_ORIGINS || process.env.CORS_ORIGINS || "";
  return fromEnv.split(",").map((origin) => origin.trim()).filter(Boolean);
}

/**
 * Origin predicate shared by the Express middleware and Socket.IO. Outside
 * production an empty origin list admits everything, and localhost is
 * admitted unless allowLocalhost is false.
 */
export function createOriginCheck(config: CorsConfig = {}): (origin: string) => boolean {
  const matchers = configuredOrigins(config).map(compilePattern);
  const allowLocalhost = config.allowLocalhost ?? true;

  return (rawOrigin: string) => {
    const origin = stripSlash(rawOrigin);
    if (process.env.NODE_ENV !== "production") {
      if (matchers.length === 0) return true;
      if (allowLocalhost) {
        const hostname = hostnameOf(origin);
        if (hostname === "localhost" || hostname === "127.0.0.1") return true;
      }
    }
    return matchers.some((matches) => matches(origin));
  };
}

/**
 * CORS options in the shape Socket.IO expects
 */
export function buildCorsOptions(config: CorsConfig = {}) {
  const isAllowed = createOriginCheck(config);
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!origin || isAllowed(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
    methods: ALLOWED_METHODS.split(", "),
    credentials: true,
    allowedHeaders: ALLOWED_HEADERS.split(", "),
  };
}

export function createCorsMiddleware(config: CorsConfig = {}) {
  const isAllowed = createOriginCheck(config);

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    const allowed = !origin || isAllowed(origin);

    if (origin && allowed) {
      res.header("Access-Control-Allow-Origin", stripSlash(origin));
      res.header("Access-Control-Allow-Credentials", "true");
    } else if (!origin) {
      res.header("Access-Control-Allow-Origin", "*");
    }
    res.header("Access-Control-Allow-Methods", ALLOWED_METHODS);
    res.header("Access-Control-Allow-Headers", ALLOWED_HEADERS);
    res.header("Access-Control-Max-Age", "86400");

    if (req.method !== "OPTIONS") {
      next();
      return;
    }
    res.sendStatus(allowed ? 200 : 403);
  };
}
