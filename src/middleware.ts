import { NextResponse, type NextRequest } from "next/server";
import { parseCorsOrigins } from "@/lib/config";

const ALLOWED_METHODS = "GET, POST, OPTIONS";

function corsHeaders(origin: string, req: NextRequest): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": ALLOWED_METHODS,
    "Access-Control-Allow-Headers":
      req.headers.get("access-control-request-headers") ?? "Content-Type, Authorization",
    Vary: "Origin",
  };
}

export function middleware(req: NextRequest) {
  const origin = req.headers.get("origin");
  const allowedOrigin =
    origin !== null && parseCorsOrigins(process.env.CORS_ORIGINS).includes(origin) ? origin : null;

  // Preflight: answer directly, never reaches a route handler
  if (req.method === "OPTIONS") {
    return new NextResponse(null, {
      status: 204,
      headers: allowedOrigin ? corsHeaders(allowedOrigin, req) : {},
    });
  }

  const res = NextResponse.next();
  if (allowedOrigin) {
    for (const [key, value] of Object.entries(corsHeaders(allowedOrigin, req))) {
      res.headers.set(key, value);
    }
  }
  return res;
}

export const config = {
  matcher: "/:path*",
};
