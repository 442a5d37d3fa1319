import { Context, MiddlewareHandler, Next } from "hono";

/**
 * CORS for the configured origins. Preflight requests are answered here and
 * never reach the routes.
 */
export function createCorsMiddleware(
  allowedOrigins: readonly string[]
): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin");

    if (origin && (allowedOrigins.includes(origin) || allowedOrigins.includes("*"))) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Vary", "Origin");
    }

    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization, Accept, X-Requested-With, Origin"
    );
    c.header("Access-Control-Max-Age", "86400"); // 24 hours

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
