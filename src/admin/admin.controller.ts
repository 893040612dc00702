import {
	Body,
	Controller,
	Delete,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Put,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { toNotificationDto, toPoolDto } from "../lending/dto/lending-out.dto";
import { Notified, PoolView } from "../lending/lending.service";
import { AdminService } from "./admin.service";
import {
	CurveInDto,
	ListAssetInDto,
	PausedInDto,
	PoolFlagsInDto,
	ReserveWithdrawalInDto,
	RiskParametersInDto,
	SetPriceInDto,
} from "./dto/admin-in.dto";
import AdminStatsDto, {
	CurveDto,
	PoolUpdateDto,
	PriceDto,
	ProtocolStateDto,
} from "./dto/admin-out.dto";

function toPoolUpdateDto({ result, notification }: Notified<PoolView>): PoolUpdateDto {
	return {
		pool: toPoolDto(result),
		notification: toNotificationDto(notification),
	};
}

@ApiTags("Admin")
@ApiBearerAuth()
@ApiForbiddenResponse({ description: "Caller lacks the required role" })
@ApiExtraModels(
	ApiEnvelopeShellDto,
	PoolUpdateDto,
	ProtocolStateDto,
	CurveDto,
	PriceDto,
	AdminStatsDto,
)
@UseGuards(AuthGuard)
@Controller("api/v1/admin")
export class AdminController {
	constructor(private readonly adminService: AdminService) {}

	@Post("assets")
	@ApiOperation({ summary: "List an asset, or reactivate a delisted one" })
	@ApiBody({ type: ListAssetInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async listAsset(
		@Body() dto: ListAssetInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(toPoolUpdateDto(await this.adminService.listAsset(caller, dto)));
	}

	@Delete("assets/:asset")
	@ApiOperation({ summary: "Deactivate a pool; withdrawals stay open" })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async delistAsset(
		@Param("asset") asset: string,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(
			toPoolUpdateDto(await this.adminService.delistAsset(caller, asset)),
		);
	}

	@Put("pools/:asset/risk")
	@ApiOperation({ summary: "Set collateral factor, threshold and bonus" })
	@ApiBody({ type: RiskParametersInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async setRiskParameters(
		@Param("asset") asset: string,
		@Body() dto: RiskParametersInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(
			toPoolUpdateDto(
				await this.adminService.setRiskParameters(caller, asset, dto),
			),
		);
	}

	@Put("pools/:asset/flags")
	@ApiOperation({ summary: "Enable or disable deposits and borrowing" })
	@ApiBody({ type: PoolFlagsInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async setPoolFlags(
		@Param("asset") asset: string,
		@Body() dto: PoolFlagsInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(
			toPoolUpdateDto(await this.adminService.setPoolFlags(caller, asset, dto)),
		);
	}

	@Put("pools/:asset/paused")
	@ApiOperation({ summary: "Pause or unpause one pool" })
	@ApiBody({ type: PausedInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async setPoolPaused(
		@Param("asset") asset: string,
		@Body() dto: PausedInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(
			toPoolUpdateDto(
				await this.adminService.setPoolPaused(caller, asset, dto.paused),
			),
		);
	}

	@Post("pools/:asset/reserves/withdraw")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Withdraw accumulated reserves" })
	@ApiBody({ type: ReserveWithdrawalInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolUpdateDto) })
	async withdrawReserves(
		@Param("asset") asset: string,
		@Body() dto: ReserveWithdrawalInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PoolUpdateDto>> {
		return envelope(
			toPoolUpdateDto(
				await this.adminService.withdrawReserves(
					caller,
					asset,
					BigInt(dto.amount),
				),
			),
		);
	}

	@Put("protocol/paused")
	@ApiOperation({ summary: "Pause or unpause every user operation" })
	@ApiBody({ type: PausedInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ProtocolStateDto) })
	async setProtocolPaused(
		@Body() dto: PausedInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<ProtocolStateDto>> {
		const { result, notification } = await this.adminService.setProtocolPaused(
			caller,
			dto.paused,
		);
		return envelope({
			paused: result,
			notification: toNotificationDto(notification),
		});
	}

	@Get("curves/:scope")
	@ApiOperation({
		summary: 'Interest curve in effect for an asset, or "default"',
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(CurveDto) })
	async getCurve(@Param("scope") scope: string): Promise<ApiEnvelope<CurveDto>> {
		return envelope(await this.adminService.getCurve(scope));
	}

	@Put("curves/:scope")
	@ApiOperation({
		summary: 'Set the default curve, or an override for one asset',
	})
	@ApiBody({ type: CurveInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(CurveDto) })
	async setCurve(
		@Param("scope") scope: string,
		@Body() dto: CurveInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<CurveDto>> {
		return envelope(
			await this.adminService.setInterestRateCurve(caller, scope, dto),
		);
	}

	@Put("prices/:asset")
	@ApiOperation({ summary: "Set a price on the static feed" })
	@ApiBody({ type: SetPriceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(PriceDto) })
	async setPrice(
		@Param("asset") asset: string,
		@Body() dto: SetPriceInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<PriceDto>> {
		const quote = await this.adminService.setPrice(
			caller,
			asset,
			BigInt(dto.price),
			dto.confidenceBps,
		);
		return envelope({ ...quote, price: quote.price.toString() });
	}

	@Get("stats")
	@ApiOperation({ summary: "Pool and loan counts" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminStatsDto) })
	async stats(@Caller() caller: string): Promise<ApiEnvelope<AdminStatsDto>> {
		return envelope(await this.adminService.stats(caller));
	}
}
