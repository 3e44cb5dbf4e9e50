import { Controller, Get } from "@nestjs/common";

@Controller()
export class HealthController {
  @Get("wheels/health")
  health() {
    return { status: "ok" };
  }
}
