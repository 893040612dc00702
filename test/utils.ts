import {
	type INestApplication,
	ValidationPipe,
} from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { JwtService } from "@nestjs/jwt";
import { Test, type TestingModule } from "@nestjs/testing";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AdminModule } from "../src/admin/admin.module";
import { AdminService } from "../src/admin/admin.service";
import { CLOCK, type Clock } from "../src/common/clock";
import { CoreModule } from "../src/common/core.module";
import { type LendingErrorCode, isLendingError } from "../src/common/errors";
import { HttpExceptionFilter } from "../src/common/filters/http-exception.filter";
import { toBaseUnits } from "../src/common/fixed-point";
import { LendingModule } from "../src/lending/lending.module";

export const T0 = 1_700_000_000;
export const ONE_YEAR = 365 * 24 * 60 * 60;

export class ManualClock implements Clock {
	constructor(private current = T0) {}

	now(): number {
		return this.current;
	}

	set(seconds: number): void {
		this.current = seconds;
	}

	advance(seconds: number): void {
		this.current += seconds;
	}
}

/** Whole units to 18-decimal base units: units(1.5) === 1500000000000000000n */
export function units(value: number | string): bigint {
	return toBaseUnits(String(value));
}

export const TEST_ENV: Record<string, string> = {
	JWT_SECRET: "test-secret",
	LENDING_ADMINS: "admin",
	LENDING_RISK_MANAGERS: "risk",
	MIN_LOAN_AMOUNT: units(1).toString(),
	MAX_UTILIZATION_BPS: "9500",
	MAX_PRICE_AGE_SECONDS: "3600",
	MIN_PRICE_CONFIDENCE_BPS: "9000",
	PRICE_FEED_TIMEOUT_MS: "200",
	PRICE_FEED_SEED: JSON.stringify({ USDC: "1", WETH: "1" }),
};

/**
 * The lending and admin modules over in-memory SQLite, with the clock
 * replaced. Configuration comes only from TEST_ENV and `env`.
 */
export async function createLendingTestingModule(
	clock: ManualClock,
	env: Record<string, string> = {},
): Promise<TestingModule> {
	const moduleRef = await Test.createTestingModule({
		imports: [
			ConfigModule.forRoot({
				isGlobal: true,
				ignoreEnvFile: true,
				load: [() => ({ ...TEST_ENV, ...env })],
			}),
			EventEmitterModule.forRoot(),
			TypeOrmModule.forRoot({
				type: "better-sqlite3",
				database: ":memory:",
				autoLoadEntities: true,
				synchronize: true,
			}),
			CoreModule,
			LendingModule,
			AdminModule,
		],
	})
		.overrideProvider(CLOCK)
		.useValue(clock)
		.compile();
	await moduleRef.init();
	return moduleRef;
}

/** Applies the global pipe and filter the way main.ts does. */
export async function initHttpApp(
	moduleRef: TestingModule,
): Promise<INestApplication> {
	const app = moduleRef.createNestApplication();
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	await app.init();
	return app;
}

export function bearer(app: INestApplication, account: string): string {
	return `Bearer ${app.get(JwtService).sign({ sub: account })}`;
}

/**
 * Lists USDC (80% factor, 85% threshold) and WETH (75% factor, 80%
 * threshold), both with a 5% liquidation bonus.
 */
export async function listMarkets(moduleRef: TestingModule): Promise<void> {
	const admin = moduleRef.get(AdminService);
	await admin.listAsset("admin", {
		asset: "USDC",
		collateralFactorBps: 8_000,
		liquidationThresholdBps: 8_500,
		liquidationBonusBps: 500,
	});
	await admin.listAsset("admin", {
		asset: "WETH",
		collateralFactorBps: 7_500,
		liquidationThresholdBps: 8_000,
		liquidationBonusBps: 500,
	});
}

/** The LendingException code a promise rejects with, or undefined if it resolves. */
export async function errorCodeOf(
	promise: Promise<unknown>,
): Promise<LendingErrorCode | undefined> {
	try {
		await promise;
	} catch (e) {
		if (isLendingError(e)) {
			return e.code;
		}
		throw e;
	}
	return undefined;
}
