import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Response } from "express";

/**
 * No CDN Cache Interceptor
 *
 * Batch counters and move states change with every decision, so ledger
 * responses must never be served from a shared cache.
 *
 * Sets: Cache-Control: private, no-store
 */
@Injectable()
export class NoCdnCacheInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      tap(() => {
        response.setHeader(
          "Cache-Control",
          "private, no-store, no-cache, must-revalidate",
        );
        response.setHeader("Pragma", "no-cache");
      }),
    );
  }
}
