import { Controller, Get, Inject } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";
import { CLOCK, Clock } from "./common/clock";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application is healthy",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				database: { type: "string", example: "up" },
				now: {
					type: "number",
					description: "Engine time in unix seconds",
					example: 1735689600,
				},
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	healthCheck() {
		return {
			status: "ok",
			database: this.dataSource.isInitialized ? "up" : "down",
			now: this.clock.now(),
			uptime: process.uptime(),
			environment: this.configService.get("NODE_ENV", "development"),
		};
	}
}
