import { Controller, Get } from "@nestjs/common";
import type { HealthResponse } from "@blockprover/shared";

@Controller()
export class HealthController {
  @Get("healthz")
  health(): HealthResponse {
    return { status: "healthy" };
  }
}
