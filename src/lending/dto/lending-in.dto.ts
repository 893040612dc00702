import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, Matches } from "class-validator";

/** Base-10 integer of 18-decimal base units. */
export const AMOUNT_PATTERN = /^\d{1,78}$/;
const AMOUNT_MESSAGE = "$property must be a whole number of base units";

export class AssetAmountInDto {
	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({
		description: "Amount in 18-decimal base units",
		example: "1000000000000000000000",
	})
	@Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
	amount!: string;
}

export class CreateLoanInDto {
	@ApiProperty({ example: "WETH" })
	@IsString()
	@IsNotEmpty()
	collateralAsset!: string;

	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	borrowAsset!: string;

	@ApiProperty({ example: "1000000000000000000" })
	@Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
	collateralAmount!: string;

	@ApiProperty({ example: "500000000000000000000" })
	@Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
	borrowAmount!: string;
}

export class AmountInDto {
	@ApiProperty({
		description:
			"Amount of the borrowed asset in base units; anything above the total debt is capped",
		example: "100000000000000000000",
	})
	@Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
	amount!: string;
}

export class MaxBorrowQueryDto {
	@ApiProperty({ example: "WETH" })
	@IsString()
	@IsNotEmpty()
	collateralAsset!: string;

	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	borrowAsset!: string;

	@ApiProperty({ example: "1000000000000000000" })
	@Matches(AMOUNT_PATTERN, { message: AMOUNT_MESSAGE })
	collateralAmount!: string;
}
