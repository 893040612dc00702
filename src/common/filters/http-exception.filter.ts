import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { toError } from "../errors";

/**
 * Renders HttpExceptions with their own body (LendingException bodies carry
 * `code`) and anything else as an opaque 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const response = host.switchToHttp().getResponse<Response>();

		if (exception instanceof HttpException) {
			const status = exception.getStatus();
			const body = exception.getResponse();
			response
				.status(status)
				.json(
					typeof body === "object"
						? body
						: { statusCode: status, message: body },
				);
			return;
		}

		const error = toError(exception);
		this.logger.error(`Unhandled error: ${error.message}`, error.stack);
		response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
		});
	}
}
