import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsBoolean,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	Min,
	Matches,
} from "class-validator";
import { AMOUNT_PATTERN } from "../../lending/dto/lending-in.dto";

export class RiskParametersInDto {
	@ApiProperty({ description: "Share of collateral value usable for borrowing", example: 7500 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	collateralFactorBps!: number;

	@ApiProperty({ example: 8000 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	liquidationThresholdBps!: number;

	@ApiProperty({ example: 500 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	liquidationBonusBps!: number;
}

export class ListAssetInDto {
	@ApiProperty({ example: "WETH" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: 7500 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	collateralFactorBps!: number;

	@ApiPropertyOptional({
		description: "Defaults to DEFAULT_LIQUIDATION_THRESHOLD_BPS",
		example: 8000,
	})
	@IsOptional()
	@IsInt()
	@Min(0)
	@Max(10_000)
	liquidationThresholdBps?: number;

	@ApiProperty({ example: 500 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	liquidationBonusBps!: number;
}

export class PoolFlagsInDto {
	@ApiPropertyOptional()
	@IsOptional()
	@IsBoolean()
	depositsEnabled?: boolean;

	@ApiPropertyOptional()
	@IsOptional()
	@IsBoolean()
	borrowingEnabled?: boolean;
}

export class PausedInDto {
	@ApiProperty()
	@IsBoolean()
	paused!: boolean;
}

export class CurveInDto {
	@ApiProperty({ example: 200 })
	@IsInt()
	@Min(0)
	baseRateBps!: number;

	@ApiProperty({ example: 400 })
	@IsInt()
	@Min(0)
	slope1Bps!: number;

	@ApiProperty({ example: 6000 })
	@IsInt()
	@Min(0)
	slope2Bps!: number;

	@ApiProperty({ example: 8000 })
	@IsInt()
	@Min(1)
	@Max(9_999)
	optimalUtilizationBps!: number;

	@ApiProperty({ example: 1000 })
	@IsInt()
	@Min(0)
	@Max(10_000)
	reserveFactorBps!: number;
}

export class ReserveWithdrawalInDto {
	@ApiProperty({ example: "1000000000000000000" })
	@Matches(AMOUNT_PATTERN, { message: "$property must be a whole number of base units" })
	amount!: string;
}

export class SetPriceInDto {
	@ApiProperty({
		description: "USD price per whole unit, 18-decimal base units",
		example: "2500000000000000000000",
	})
	@Matches(AMOUNT_PATTERN, { message: "$property must be a whole number of base units" })
	price!: string;

	@ApiPropertyOptional({ example: 10_000 })
	@IsOptional()
	@IsInt()
	@Min(0)
	@Max(10_000)
	confidenceBps?: number;
}
