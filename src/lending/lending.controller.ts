import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseEnumPipe,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { Observable, map } from "rxjs";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForListDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import {
	AmountInDto,
	AssetAmountInDto,
	CreateLoanInDto,
	MaxBorrowQueryDto,
} from "./dto/lending-in.dto";
import {
	BalanceChangeDto,
	BalanceDto,
	HealthDto,
	LiquidationDto,
	LoanCreatedDto,
	LoanDto,
	MaxBorrowDto,
	PoolDto,
	RepaymentDto,
	toBalanceChangeDto,
	toBalanceDto,
	toHealthDto,
	toLiquidationDto,
	toLoanDto,
	toNotificationDto,
	toPoolDto,
	toRepaymentDto,
} from "./dto/lending-out.dto";
import { LendingService } from "./lending.service";
import { LOAN_STATUS, LoanStatus } from "./loans/loan.entity";

const LOAN_STATUS_ENUM: Record<string, LoanStatus> = Object.fromEntries(
	LOAN_STATUS.map((s) => [s, s] as const),
);

@ApiTags("1 - Lending")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	PoolDto,
	BalanceDto,
	BalanceChangeDto,
	LoanDto,
	LoanCreatedDto,
	RepaymentDto,
	LiquidationDto,
	HealthDto,
	MaxBorrowDto,
)
@Controller("api/v1/lending")
export class LendingController {
	constructor(
		private readonly lending: LendingService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("pools")
	@ApiOperation({ summary: "All listed pools with projected interest" })
	@ApiOkResponse({ schema: getSchemaPathForListDto(PoolDto) })
	async listPools(): Promise<ApiEnvelope<PoolDto[]>> {
		const views = await this.lending.listPools();
		return envelope(views.map(toPoolDto));
	}

	@Get("pools/:asset")
	@ApiOperation({ summary: "One pool with projected interest and rates" })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolDto) })
	@ApiNotFoundResponse({ description: "Asset not listed" })
	async getPool(@Param("asset") asset: string): Promise<ApiEnvelope<PoolDto>> {
		return envelope(toPoolDto(await this.lending.getPool(asset)));
	}

	@Post("pools/:asset/accrue")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Persist the interest accrued by a pool" })
	@ApiOkResponse({ schema: getSchemaPathForDto(PoolDto) })
	async accruePool(@Param("asset") asset: string): Promise<ApiEnvelope<PoolDto>> {
		return envelope(toPoolDto(await this.lending.accruePool(asset)));
	}

	@Post("deposits")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: AssetAmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(BalanceChangeDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({ description: "Pool inactive or deposits disabled" })
	@ApiOperation({ summary: "Supply an asset to its pool" })
	async deposit(
		@Body() dto: AssetAmountInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<BalanceChangeDto>> {
		const outcome = await this.lending.deposit(
			caller,
			dto.asset,
			BigInt(dto.amount),
		);
		return envelope(toBalanceChangeDto(outcome));
	}

	@Post("withdrawals")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: AssetAmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(BalanceChangeDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({
		description: "Balance or pool liquidity too low",
	})
	@ApiOperation({ summary: "Withdraw supplied funds" })
	async withdraw(
		@Body() dto: AssetAmountInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<BalanceChangeDto>> {
		const outcome = await this.lending.withdraw(
			caller,
			dto.asset,
			BigInt(dto.amount),
		);
		return envelope(toBalanceChangeDto(outcome));
	}

	@Get("balances/mine")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForListDto(BalanceDto) })
	@ApiOperation({ summary: "Deposited balances of the caller" })
	async myBalances(
		@Caller() caller: string,
	): Promise<ApiEnvelope<BalanceDto[]>> {
		const balances = await this.lending.listBalances(caller);
		return envelope(balances.map(toBalanceDto));
	}

	@Get("max-borrow")
	@ApiOperation({
		summary: "Largest borrow a collateral position supports at current prices",
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(MaxBorrowDto) })
	async maxBorrow(
		@Query() query: MaxBorrowQueryDto,
	): Promise<ApiEnvelope<MaxBorrowDto>> {
		const amount = await this.lending.maxBorrow(
			query.collateralAsset,
			query.borrowAsset,
			BigInt(query.collateralAmount),
		);
		return envelope({ maxBorrow: amount.toString() });
	}

	@Post("loans")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: CreateLoanInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(LoanCreatedDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({
		description: "Collateral, liquidity or utilization check failed",
	})
	@ApiOperation({ summary: "Open a loan against posted collateral" })
	async createLoan(
		@Body() dto: CreateLoanInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<LoanCreatedDto>> {
		const { result, notification } = await this.lending.createLoan({
			borrower: caller,
			collateralAsset: dto.collateralAsset,
			borrowAsset: dto.borrowAsset,
			collateralAmount: BigInt(dto.collateralAmount),
			borrowAmount: BigInt(dto.borrowAmount),
		});
		return envelope({
			loan: toLoanDto(result),
			notification: toNotificationDto(notification),
		});
	}

	@Get("loans/mine")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiQuery({ name: "status", required: false, enum: LOAN_STATUS })
	@ApiOkResponse({
		description: "A page of the caller's loans, newest first",
		schema: getSchemaPathForPaginatedDto(LoanDto),
	})
	@ApiOperation({ summary: "Loans of the authenticated borrower" })
	async myLoans(
		@Caller() caller: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status", new ParseEnumPipe(LOAN_STATUS_ENUM, { optional: true }))
		status?: LoanStatus,
	): Promise<ApiPaginatedEnvelope<LoanDto[]>> {
		const { items, nextCursor, total } = await this.lending.listLoans(
			caller,
			{ status },
			limit,
			cursor,
		);
		return paginatedEnvelope(items.map(toLoanDto), { total, nextCursor });
	}

	@Get("loans/:id")
	@ApiOperation({ summary: "One loan with interest projected to now" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanDto) })
	@ApiNotFoundResponse({ description: "Loan not found" })
	async getLoan(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<LoanDto>> {
		return envelope(toLoanDto(await this.lending.getLoan(id)));
	}

	@Get("loans/:id/health")
	@ApiOperation({ summary: "Health factor of an active loan" })
	@ApiOkResponse({ schema: getSchemaPathForDto(HealthDto) })
	async getLoanHealth(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<HealthDto>> {
		return envelope(toHealthDto(await this.lending.getLoanHealth(id)));
	}

	@Post("loans/:id/repay")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepaymentDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "Repay a loan, interest first" })
	async repay(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: AmountInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<RepaymentDto>> {
		const { result, notification } = await this.lending.repayLoan(
			caller,
			id,
			BigInt(dto.amount),
		);
		return envelope(toRepaymentDto(result, notification));
	}

	@Post("loans/:id/liquidate")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(LiquidationDto) })
	@ApiUnprocessableEntityResponse({ description: "Loan is not liquidatable" })
	@ApiOperation({
		summary: "Repay part or all of an unhealthy loan in exchange for collateral",
	})
	async liquidate(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: AmountInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<LiquidationDto>> {
		const { result, notification } = await this.lending.liquidate(
			caller,
			id,
			BigInt(dto.amount),
		);
		return envelope(toLiquidationDto(result, notification));
	}

	@Sse("events")
	@ApiOperation({
		summary: "Stream of lending activity, optionally narrowed to one account",
	})
	@ApiQuery({ name: "account", required: false })
	events(@Query("account") account?: string): Observable<SseEvent> {
		return this.sseService
			.accountEvents(account)
			.pipe(map((activity) => ({ data: activity })));
	}
}
