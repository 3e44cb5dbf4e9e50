import { Type } from "class-transformer";
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Min,
} from "class-validator";

const AMOUNT_PATTERN = /^\d+$/;
const AMOUNT_MESSAGE = "amounts must be integer strings in the currency's smallest unit";

export class CreateWheelDto {
  @IsArray()
  @IsString({ each: true })
  entries!: string[];

  @IsArray()
  @ArrayMinSize(1)
  @Matches(AMOUNT_PATTERN, { each: true, message: AMOUNT_MESSAGE })
  prizeAmounts!: string[];

  @IsInt()
  @Min(0)
  delayMs!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  claimWindowMs?: number;

  @IsOptional()
  @IsString()
  clientSeed?: string;
}

export class DonateDto {
  @IsString()
  @Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
  amount!: string;
}

export class UpdateEntriesDto {
  @IsArray()
  @IsString({ each: true })
  entries!: string[];
}

export class UpdatePrizesDto {
  @IsArray()
  @Matches(AMOUNT_PATTERN, { each: true, message: AMOUNT_MESSAGE })
  prizeAmounts!: string[];
}

export class UpdateDelayDto {
  @IsInt()
  @Min(0)
  delayMs!: number;
}

export class UpdateClaimWindowDto {
  @IsInt()
  @Min(0)
  claimWindowMs!: number;
}

export class DrawDto {
  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  permutation?: number[];

  @IsOptional()
  @IsBoolean()
  autoAssign?: boolean;
}

export class EventsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}
