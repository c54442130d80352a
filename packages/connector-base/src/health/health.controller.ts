import {
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Inject,
	ServiceUnavailableException,
} from "@nestjs/common";
import { HEALTH_SERVICE, type HealthResponse, type HealthService } from "./health.service.js";

@Controller("health")
export class HealthController {
	constructor(@Inject(HEALTH_SERVICE) private readonly healthService: HealthService) {}

	/**
	 * Liveness probe - is the process alive?
	 */
	@Get("live")
	@HttpCode(HttpStatus.OK)
	liveness(): { status: "ok" } {
		return { status: "ok" };
	}

	/**
	 * Readiness probe - answers 503 unless every check passes.
	 */
	@Get("ready")
	readiness(): HealthResponse {
		const result = this.healthService.check();
		if (result.status !== "ok") {
			throw new ServiceUnavailableException(result);
		}
		return result;
	}

	@Get()
	getHealth(): HealthResponse {
		return this.healthService.check();
	}
}
