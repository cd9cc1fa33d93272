import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from "@nestjs/common";
import { Observable, tap } from "rxjs";
import type { Request } from "express";

function statusOf(err: unknown): number {
  return err instanceof HttpException ? err.getStatus() : 500;
}

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== "http") return next.handle();

    const req = context.switchToHttp().getRequest<Request>();
    const route = `${req.method} ${req.originalUrl.split("?")[0]}`;
    const started = Date.now();

    return next.handle().pipe(
      tap({
        next: () => this.logger.log(`${route} ${Date.now() - started}ms`),
        error: (err: unknown) => {
          const status = statusOf(err);
          const line = `${route} ${status} ${Date.now() - started}ms`;
          if (status >= 500) this.logger.error(line);
          else this.logger.warn(line);
        },
      }),
    );
  }
}
