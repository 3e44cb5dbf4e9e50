import { Body, Controller, Get, Inject, Param, Post, Put, Query, UseGuards } from "@nestjs/common";
import { Auth, AuthContext, AuthGuard } from "@prize-wheel/core-auth";
import { WheelService } from "./wheel.service";
import {
  CreateWheelDto,
  DonateDto,
  DrawDto,
  EventsQueryDto,
  UpdateClaimWindowDto,
  UpdateDelayDto,
  UpdateEntriesDto,
  UpdatePrizesDto,
} from "./dto/wheel-request.dto";
import {
  ClaimResponse,
  DonateResponse,
  DrawResponse,
  FairnessView,
  ReclaimResponse,
  WheelEventView,
  WheelView,
} from "./dto/wheel-response.dto";

const MAX_EVENTS_PAGE = 500;

@Controller("wheels")
@UseGuards(AuthGuard)
export class WheelController {
  constructor(@Inject(WheelService) private readonly wheelService: WheelService) {}

  @Post()
  create(@Auth() ctx: AuthContext, @Body() dto: CreateWheelDto): Promise<WheelView> {
    return this.wheelService.create(ctx, dto);
  }

  @Get(":id")
  get(@Param("id") id: string): Promise<WheelView> {
    return this.wheelService.getWheel(id);
  }

  @Get(":id/events")
  events(@Param("id") id: string, @Query() query: EventsQueryDto): Promise<WheelEventView[]> {
    return this.wheelService.listEvents(id, clampLimit(query.limit), toOffset(query.offset));
  }

  @Get(":id/fairness")
  fairness(@Param("id") id: string): Promise<FairnessView> {
    return this.wheelService.fairness(id);
  }

  @Post(":id/donate")
  donate(@Auth() ctx: AuthContext, @Param("id") id: string, @Body() dto: DonateDto): Promise<DonateResponse> {
    return this.wheelService.donate(ctx, id, dto);
  }

  @Put(":id/entries")
  updateEntries(@Auth() ctx: AuthContext, @Param("id") id: string, @Body() dto: UpdateEntriesDto): Promise<WheelView> {
    return this.wheelService.updateEntries(ctx, id, dto);
  }

  @Put(":id/prizes")
  updatePrizes(@Auth() ctx: AuthContext, @Param("id") id: string, @Body() dto: UpdatePrizesDto): Promise<WheelView> {
    return this.wheelService.updatePrizes(ctx, id, dto);
  }

  @Put(":id/delay")
  updateDelay(@Auth() ctx: AuthContext, @Param("id") id: string, @Body() dto: UpdateDelayDto): Promise<WheelView> {
    return this.wheelService.updateDelay(ctx, id, dto);
  }

  @Put(":id/claim-window")
  updateClaimWindow(
    @Auth() ctx: AuthContext,
    @Param("id") id: string,
    @Body() dto: UpdateClaimWindowDto,
  ): Promise<WheelView> {
    return this.wheelService.updateClaimWindow(ctx, id, dto);
  }

  @Post(":id/draw")
  draw(@Auth() ctx: AuthContext, @Param("id") id: string, @Body() dto: DrawDto): Promise<DrawResponse> {
    return this.wheelService.draw(ctx, id, dto ?? {});
  }

  @Post(":id/auto-assign")
  autoAssign(@Auth() ctx: AuthContext, @Param("id") id: string): Promise<DrawResponse> {
    return this.wheelService.autoAssignLast(ctx, id);
  }

  @Post(":id/claim")
  claim(@Auth() ctx: AuthContext, @Param("id") id: string): Promise<ClaimResponse> {
    return this.wheelService.claim(ctx, id);
  }

  @Post(":id/reclaim")
  reclaim(@Auth() ctx: AuthContext, @Param("id") id: string): Promise<ReclaimResponse> {
    return this.wheelService.reclaim(ctx, id);
  }

  @Post(":id/cancel")
  cancel(@Auth() ctx: AuthContext, @Param("id") id: string): Promise<ReclaimResponse> {
    return this.wheelService.cancel(ctx, id);
  }
}

function clampLimit(limit?: number | string): number {
  const parsed = Number(limit ?? 100);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 100;
  }
  return Math.min(Math.floor(parsed), MAX_EVENTS_PAGE);
}

function toOffset(offset?: number | string): number {
  const parsed = Number(offset ?? 0);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : 0;
}
