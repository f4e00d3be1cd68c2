import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { SerialExecutor, SwapEngine } from "@swap-escrow/sdk";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly engine: SwapEngine,
		private readonly executor: SerialExecutor,
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
				timestamp: { type: "string", example: "2025-08-26T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
				escrow: {
					type: "object",
					properties: {
						initialized: { type: "boolean", example: true },
						requests: { type: "number", example: 42 },
						queued: { type: "number", example: 0 },
					},
				},
			},
		},
	})
	healthCheck() {
		return {
			status: "ok",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get("NODE_ENV", "development"),
			escrow: {
				initialized: this.engine.initialized,
				requests: this.engine.count(),
				queued: this.executor.size,
			},
		};
	}
}
