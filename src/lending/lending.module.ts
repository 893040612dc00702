import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AuthModule } from "../auth/auth.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { OracleModule } from "../oracle/oracle.module";
import {
	ACTIVITY_NOTIFIER,
	EventEmitterActivityNotifier,
} from "./activity-notifier";
import { LedgerTransactions } from "./ledger-transactions.service";
import { LendingController } from "./lending.controller";
import { LendingService } from "./lending.service";
import { LiquidationEngineService } from "./liquidation/liquidation-engine.service";
import { LoanRegistryService } from "./loans/loan-registry.service";
import { Loan } from "./loans/loan.entity";
import { InterestRateCurve } from "./pools/interest-rate-curve.entity";
import { PoolLedgerService } from "./pools/pool-ledger.service";
import { Pool } from "./pools/pool.entity";
import { ProtocolState } from "./pools/protocol-state.entity";
import { UserBalance } from "./pools/user-balance.entity";

@Module({
	imports: [
		TypeOrmModule.forFeature([
			Pool,
			UserBalance,
			InterestRateCurve,
			ProtocolState,
			Loan,
		]),
		AuthModule,
		OracleModule,
	],
	providers: [
		PoolLedgerService,
		LoanRegistryService,
		LiquidationEngineService,
		LedgerTransactions,
		LendingService,
		ServerSentEventsService,
		{ provide: ACTIVITY_NOTIFIER, useClass: EventEmitterActivityNotifier },
	],
	controllers: [LendingController],
	exports: [
		PoolLedgerService,
		LedgerTransactions,
		LendingService,
		ACTIVITY_NOTIFIER,
	],
})
export class LendingModule {}
