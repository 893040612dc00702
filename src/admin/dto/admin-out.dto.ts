import { ApiProperty } from "@nestjs/swagger";
import { NotificationDto, PoolDto } from "../../lending/dto/lending-out.dto";
import { LOAN_STATUS, LoanStatus } from "../../lending/loans/loan.entity";

export class PoolUpdateDto {
	@ApiProperty({ type: () => PoolDto })
	pool!: PoolDto;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class ProtocolStateDto {
	@ApiProperty()
	paused!: boolean;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class CurveDto {
	@ApiProperty({ example: "default" })
	scope!: string;

	@ApiProperty()
	baseRateBps!: number;

	@ApiProperty()
	slope1Bps!: number;

	@ApiProperty()
	slope2Bps!: number;

	@ApiProperty()
	optimalUtilizationBps!: number;

	@ApiProperty()
	reserveFactorBps!: number;
}

export class PriceDto {
	@ApiProperty({ example: "WETH" })
	asset!: string;

	@ApiProperty()
	price!: string;

	@ApiProperty()
	confidenceBps!: number;
}

export default class AdminStatsDto {
	@ApiProperty()
	protocolPaused!: boolean;

	@ApiProperty({ description: "Pools by state" })
	pools!: { total: number; active: number; paused: number };

	@ApiProperty({
		description: "Loan count per status",
		example: Object.fromEntries(LOAN_STATUS.map((s) => [s, 0] as const)),
	})
	loans!: Record<LoanStatus, number>;
}
