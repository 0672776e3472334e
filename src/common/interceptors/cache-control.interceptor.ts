import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";
import * as crypto from "crypto";
import { isRecord } from "../utils/validation.util";

/**
 * Sets Cache-Control headers based on endpoint patterns and data volatility.
 *
 * - ETag generation (MD5 of body) for GET responses
 * - Respects existing Cache-Control headers (won't overwrite if set by a
 *   controller-level interceptor such as NoCdnCacheInterceptor)
 */
function isEmptyHolidayResult(body: unknown): boolean {
  if (!isRecord(body)) return false;
  const list = body.periods ?? body.holidays;
  return Array.isArray(list) && list.length === 0;
}

@Injectable()
export class CacheControlInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    return next.handle().pipe(
      tap((data: unknown) => {
        if (request.method === "GET" && data && typeof data === "object") {
          const etag = this.generateETag(data);
          if (etag) {
            response.setHeader("ETag", etag);
          }
        }

        if (!response.getHeader("Cache-Control")) {
          response.setHeader(
            "Cache-Control",
            CacheControlInterceptor.cacheHeaderFor(request.path, request.method, data),
          );
          response.setHeader("Vary", "Accept-Encoding");
        }
      }),
    );
  }

  static cacheHeaderFor(path: string, method: string, body?: unknown): string {
    // No caching for write operations
    if (method !== "GET" && method !== "HEAD") {
      return "no-store, no-cache, must-revalidate";
    }

    // Health endpoints - minimal cache (2s) for monitoring
    if (path.includes("/health")) {
      return "public, max-age=2, s-maxage=2";
    }

    // Holiday calendars are published per year - long cache (1 day).
    // An empty calendar may be an upstream outage, so it is not stored.
    if (path.includes("/holidays")) {
      if (isEmptyHolidayResult(body)) {
        return "no-store";
      }
      return "public, max-age=86400, s-maxage=86400, stale-while-revalidate=172800";
    }

    // Swagger/OpenAPI
    if (path.startsWith("/api")) {
      return "public, max-age=300, s-maxage=300";
    }

    // Ledger and property state changes with every decision
    return "private, no-store";
  }

  private generateETag(data: object): string | null {
    try {
      const hash = crypto
        .createHash("md5")
        .update(JSON.stringify(data))
        .digest("hex");
      return `"${hash}"`;
    } catch {
      return null;
    }
  }
}
