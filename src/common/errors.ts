import { HttpException, HttpStatus } from "@nestjs/common";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

const STATUS_BY_CODE = {
	ZeroAmount: HttpStatus.BAD_REQUEST,
	InvalidParameter: HttpStatus.BAD_REQUEST,
	AssetNotSupported: HttpStatus.NOT_FOUND,
	AssetAlreadyListed: HttpStatus.CONFLICT,
	PoolInactive: HttpStatus.UNPROCESSABLE_ENTITY,
	DepositsDisabled: HttpStatus.UNPROCESSABLE_ENTITY,
	BorrowingDisabled: HttpStatus.UNPROCESSABLE_ENTITY,
	ProtocolPaused: HttpStatus.SERVICE_UNAVAILABLE,
	InsufficientBalance: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientCollateral: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientLiquidity: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientReserves: HttpStatus.UNPROCESSABLE_ENTITY,
	LoanBelowMinimum: HttpStatus.UNPROCESSABLE_ENTITY,
	LoanNotFound: HttpStatus.NOT_FOUND,
	LoanNotActive: HttpStatus.CONFLICT,
	RepaymentExceedsDebt: HttpStatus.UNPROCESSABLE_ENTITY,
	NotLiquidatable: HttpStatus.UNPROCESSABLE_ENTITY,
	StalePriceData: HttpStatus.SERVICE_UNAVAILABLE,
	LowConfidencePrice: HttpStatus.SERVICE_UNAVAILABLE,
	InvalidPriceData: HttpStatus.SERVICE_UNAVAILABLE,
	PriceFeedTimeout: HttpStatus.SERVICE_UNAVAILABLE,
	UtilizationLimitExceeded: HttpStatus.UNPROCESSABLE_ENTITY,
	Unauthorized: HttpStatus.FORBIDDEN,
} as const satisfies Record<string, HttpStatus>;

export type LendingErrorCode = keyof typeof STATUS_BY_CODE;

export type LendingErrorBody = {
	statusCode: number;
	code: LendingErrorCode;
	message: string;
};

/**
 * A rejected lending operation. The code names the invariant that failed;
 * the HTTP status follows from it.
 */
export class LendingException extends HttpException {
	constructor(
		readonly code: LendingErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		const status = STATUS_BY_CODE[code];
		super(
			{ statusCode: status, code, message } satisfies LendingErrorBody,
			status,
			options,
		);
	}
}

export function isLendingError(
	err: unknown,
	code?: LendingErrorCode,
): err is LendingException {
	return (
		err instanceof LendingException && (code === undefined || err.code === code)
	);
}
