import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";

const QUIET_PATHS = ["/api/v1/health"];

@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
	private readonly logger = new Logger("HTTP");

	use(req: Request, res: Response, next: NextFunction) {
		if (QUIET_PATHS.includes(req.path)) {
			return next();
		}
		const started = Date.now();
		res.on("finish", () => {
			this.logger.log(
				`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`,
			);
		});
		next();
	}
}
