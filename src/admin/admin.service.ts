import { Inject, Injectable, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { ACCESS_GATE, AccessGate, AdminAction } from "../access/access-gate";
import { CLOCK, Clock } from "../common/clock";
import { LendingException } from "../common/errors";
import { isBps } from "../common/fixed-point";
import { NewActivity } from "../common/lending.event";
import { LENDING_CONFIG, LendingConfig } from "../config/lending.config";
import {
	ACTIVITY_NOTIFIER,
	ActivityNotifier,
	dispatchActivity,
} from "../lending/activity-notifier";
import {
	LedgerTransactions,
	poolLock,
} from "../lending/ledger-transactions.service";
import { Notified, PoolView, viewOf } from "../lending/lending.service";
import { LOAN_STATUS, Loan, LoanStatus } from "../lending/loans/loan.entity";
import {
	CurveParameters,
	DEFAULT_CURVE_SCOPE,
	InterestRateCurve,
} from "../lending/pools/interest-rate-curve.entity";
import { validateCurve } from "../lending/pools/interest-rate-model";
import { PoolLedgerService } from "../lending/pools/pool-ledger.service";
import { Pool } from "../lending/pools/pool.entity";
import {
	PROTOCOL_STATE_ID,
	ProtocolState,
} from "../lending/pools/protocol-state.entity";
import { StaticPriceFeed } from "../oracle/static-price-feed";

export type RiskParameters = {
	collateralFactorBps: number;
	liquidationThresholdBps: number;
	liquidationBonusBps: number;
};

export type ListAssetInput = Omit<RiskParameters, "liquidationThresholdBps"> & {
	asset: string;
	liquidationThresholdBps?: number;
};

export type PoolFlags = {
	depositsEnabled?: boolean;
	borrowingEnabled?: boolean;
};

export type ScopedCurve = CurveParameters & { scope: string };

function scoped(scope: string, curve: CurveParameters): ScopedCurve {
	return {
		scope,
		baseRateBps: curve.baseRateBps,
		slope1Bps: curve.slope1Bps,
		slope2Bps: curve.slope2Bps,
		optimalUtilizationBps: curve.optimalUtilizationBps,
		reserveFactorBps: curve.reserveFactorBps,
	};
}

export type AdminStats = {
	protocolPaused: boolean;
	pools: { total: number; active: number; paused: number };
	loans: Record<LoanStatus, number>;
};

/**
 * Operator surface. Every call is checked against the AccessGate before any
 * state is read, and every pool change accrues the pool first so that
 * interest up to now is charged under the old parameters.
 */
@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(
		@Inject(CLOCK) private readonly clock: Clock,
		@Inject(ACCESS_GATE) private readonly gate: AccessGate,
		@Inject(LENDING_CONFIG) private readonly config: LendingConfig,
		@Inject(ACTIVITY_NOTIFIER) private readonly notifier: ActivityNotifier,
		private readonly tx: LedgerTransactions,
		private readonly ledger: PoolLedgerService,
		private readonly priceFeed: StaticPriceFeed,
	) {}

	async listAsset(
		caller: string,
		input: ListAssetInput,
	): Promise<Notified<PoolView>> {
		await this.authorize(caller, "asset.list");
		const params: RiskParameters = {
			collateralFactorBps: input.collateralFactorBps,
			liquidationThresholdBps:
				input.liquidationThresholdBps ??
				this.config.defaultLiquidationThresholdBps,
			liquidationBonusBps: input.liquidationBonusBps,
		};
		this.validateRiskParameters(params);

		const { now, view } = await this.tx.run([poolLock(input.asset)], async (m) => {
			const now = this.clock.now();
			const existing = await m.findOne(Pool, { where: { asset: input.asset } });
			if (existing?.isActive) {
				throw new LendingException(
					"AssetAlreadyListed",
					`Asset ${input.asset} is already listed`,
				);
			}
			let pool: Pool;
			if (existing) {
				await this.ledger.accrue(m, existing, now);
				pool = Object.assign(existing, params, { isActive: true });
			} else {
				pool = m.create(Pool, {
					asset: input.asset,
					totalDeposits: 0n,
					totalBorrows: 0n,
					totalReserves: 0n,
					lastUpdateTime: now,
					isActive: true,
					isPaused: false,
					borrowingEnabled: true,
					depositsEnabled: true,
					...params,
				});
			}
			return { now, view: await this.save(m, pool) };
		});

		this.logger.log(`Asset ${input.asset} listed by ${caller}`);
		return this.announcePool(view, "listed", now);
	}

	async delistAsset(caller: string, asset: string): Promise<Notified<PoolView>> {
		await this.authorize(caller, "asset.delist");
		return this.updatePool(asset, "delisted", (pool) => {
			pool.isActive = false;
		});
	}

	async setRiskParameters(
		caller: string,
		asset: string,
		params: RiskParameters,
	): Promise<Notified<PoolView>> {
		await this.authorize(caller, "pool.set-risk");
		this.validateRiskParameters(params);
		return this.updatePool(asset, "risk-parameters", (pool) => {
			Object.assign(pool, params);
		});
	}

	async setPoolFlags(
		caller: string,
		asset: string,
		flags: PoolFlags,
	): Promise<Notified<PoolView>> {
		await this.authorize(caller, "pool.set-flags");
		return this.updatePool(asset, "flags", (pool) => {
			pool.depositsEnabled = flags.depositsEnabled ?? pool.depositsEnabled;
			pool.borrowingEnabled = flags.borrowingEnabled ?? pool.borrowingEnabled;
		});
	}

	async setPoolPaused(
		caller: string,
		asset: string,
		paused: boolean,
	): Promise<Notified<PoolView>> {
		await this.authorize(caller, "pool.pause");
		return this.updatePool(asset, paused ? "paused" : "unpaused", (pool) => {
			pool.isPaused = paused;
		});
	}

	async setProtocolPaused(
		caller: string,
		paused: boolean,
	): Promise<Notified<boolean>> {
		await this.authorize(caller, "protocol.pause");
		const now = this.clock.now();
		await this.tx.run([], async (m) => {
			await m.save(ProtocolState, { id: PROTOCOL_STATE_ID, paused });
		});
		this.logger.log(`Protocol ${paused ? "paused" : "unpaused"} by ${caller}`);
		return this.announce(paused, { type: "protocol-updated", at: now, paused });
	}

	/** The curve in effect for a scope: an asset, or the default. */
	async getCurve(scope: string): Promise<ScopedCurve> {
		const curve = await this.tx.run([], async (m) => {
			if (scope === DEFAULT_CURVE_SCOPE) {
				return (
					(await m.findOne(InterestRateCurve, { where: { scope } })) ??
					this.config.defaultCurve
				);
			}
			return this.ledger.getCurve(m, scope);
		});
		return scoped(scope, curve);
	}

	/**
	 * Replaces the default curve or one asset's override. Pools the curve
	 * applies to are accrued at their old rate first.
	 */
	async setInterestRateCurve(
		caller: string,
		scope: string,
		curve: CurveParameters,
	): Promise<ScopedCurve> {
		await this.authorize(caller, "curve.set");
		const invalid = validateCurve(curve);
		if (invalid) {
			throw new LendingException("InvalidParameter", invalid);
		}

		let applied: { now: number; affected: string[] } | undefined;
		while (!applied) {
			const locked = await this.tx.run([], (m) => this.poolsUnderCurve(m, scope));
			applied = await this.tx.run(locked.map(poolLock), async (m) => {
				// A pool listed or overridden since the locks were chosen: retry.
				const affected = await this.poolsUnderCurve(m, scope);
				if (affected.some((asset) => !locked.includes(asset))) {
					return undefined;
				}
				const now = this.clock.now();
				for (const asset of affected) {
					await this.ledger.accrue(m, await this.ledger.findPool(m, asset), now);
				}
				await m.save(InterestRateCurve, scoped(scope, curve));
				return { now, affected };
			});
		}
		const { now, affected } = applied;

		this.logger.log(
			`Curve ${scope} set by ${caller}: base ${curve.baseRateBps} slope1 ${curve.slope1Bps} slope2 ${curve.slope2Bps} optimal ${curve.optimalUtilizationBps} reserve ${curve.reserveFactorBps}`,
		);
		for (const asset of affected) {
			await this.announce(undefined, {
				type: "pool-updated",
				at: now,
				asset,
				reason: "curve",
			});
		}
		return scoped(scope, curve);
	}

	async withdrawReserves(
		caller: string,
		asset: string,
		amount: bigint,
	): Promise<Notified<PoolView>> {
		await this.authorize(caller, "reserves.withdraw");
		const { now, view } = await this.tx.run([poolLock(asset)], async (m) => {
			const now = this.clock.now();
			const pool = await this.ledger.findPool(m, asset);
			const updated = await this.ledger.withdrawReserves(m, pool, amount, now);
			return { now, view: viewOf(updated, await this.ledger.getCurve(m, asset)) };
		});
		this.logger.log(`Reserves of ${amount} ${asset} withdrawn by ${caller}`);
		return this.announcePool(view, "reserves-withdrawn", now);
	}

	async setPrice(
		caller: string,
		asset: string,
		price: bigint,
		confidenceBps?: number,
	): Promise<{ asset: string; price: bigint; confidenceBps: number }> {
		await this.authorize(caller, "price.set");
		if (price <= 0n) {
			throw new LendingException("InvalidParameter", "Price must be positive");
		}
		this.priceFeed.setPrice(asset, price, { confidenceBps });
		const quote = await this.priceFeed.getPrice(asset);
		return { asset, price: quote.price, confidenceBps: quote.confidenceBps };
	}

	async stats(caller: string): Promise<AdminStats> {
		await this.authorize(caller, "stats.read");
		return this.tx.run([], async (m) => {
			const pools = await this.ledger.listPools(m);
			const rows = await m
				.createQueryBuilder(Loan, "l")
				.select("l.status", "status")
				.addSelect("COUNT(*)", "count")
				.groupBy("l.status")
				.getRawMany<{ status: string; count: number | string }>();
			const loans: Record<LoanStatus, number> = {
				active: 0,
				repaid: 0,
				liquidated: 0,
				defaulted: 0,
			};
			for (const row of rows) {
				const status = LOAN_STATUS.find((s) => s === row.status);
				if (status) {
					loans[status] = Number(row.count);
				}
			}
			return {
				protocolPaused: await this.ledger.isProtocolPaused(m),
				pools: {
					total: pools.length,
					active: pools.filter((p) => p.isActive).length,
					paused: pools.filter((p) => p.isPaused).length,
				},
				loans,
			};
		});
	}

	private async authorize(caller: string, action: AdminAction): Promise<void> {
		if (!(await this.gate.authorize(caller, action))) {
			this.logger.warn(`Rejected ${action} by ${caller}`);
			throw new LendingException(
				"Unauthorized",
				`Caller is not allowed to perform ${action}`,
			);
		}
	}

	private validateRiskParameters(params: RiskParameters): void {
		const { collateralFactorBps, liquidationThresholdBps, liquidationBonusBps } =
			params;
		if (
			!isBps(collateralFactorBps) ||
			!isBps(liquidationThresholdBps) ||
			!isBps(liquidationBonusBps)
		) {
			throw new LendingException(
				"InvalidParameter",
				"Risk parameters must be between 0 and 10000 bps",
			);
		}
		if (collateralFactorBps > this.config.maxCollateralFactorBps) {
			throw new LendingException(
				"InvalidParameter",
				`Collateral factor ${collateralFactorBps} exceeds the maximum ${this.config.maxCollateralFactorBps}`,
			);
		}
		if (liquidationBonusBps > this.config.maxLiquidationBonusBps) {
			throw new LendingException(
				"InvalidParameter",
				`Liquidation bonus ${liquidationBonusBps} exceeds the maximum ${this.config.maxLiquidationBonusBps}`,
			);
		}
		if (collateralFactorBps > liquidationThresholdBps) {
			throw new LendingException(
				"InvalidParameter",
				"Collateral factor must not exceed the liquidation threshold",
			);
		}
	}

	private async updatePool(
		asset: string,
		reason: string,
		change: (pool: Pool) => void,
	): Promise<Notified<PoolView>> {
		const { now, view } = await this.tx.run([poolLock(asset)], async (m) => {
			const now = this.clock.now();
			const pool = await this.ledger.findPool(m, asset);
			await this.ledger.accrue(m, pool, now);
			change(pool);
			return { now, view: await this.save(m, pool) };
		});
		this.logger.log(`Pool ${asset} updated: ${reason}`);
		return this.announcePool(view, reason, now);
	}

	private async save(m: EntityManager, pool: Pool): Promise<PoolView> {
		const saved = await m.save(Pool, pool);
		return viewOf(saved, await this.ledger.getCurve(m, saved.asset));
	}

	/** Assets whose rate is set by the curve with this scope. */
	private async poolsUnderCurve(
		m: EntityManager,
		scope: string,
	): Promise<string[]> {
		if (scope !== DEFAULT_CURVE_SCOPE) {
			await this.ledger.findPool(m, scope);
			return [scope];
		}
		const overrides = new Set(
			(await m.find(InterestRateCurve)).map((c) => c.scope),
		);
		return (await this.ledger.listPools(m))
			.map((p) => p.asset)
			.filter((asset) => !overrides.has(asset));
	}

	private announcePool(
		view: PoolView,
		reason: string,
		at: number,
	): Promise<Notified<PoolView>> {
		return this.announce(view, {
			type: "pool-updated",
			at,
			asset: view.pool.asset,
			reason,
		});
	}

	private async announce<T>(
		result: T,
		activity: NewActivity,
	): Promise<Notified<T>> {
		const notification = await dispatchActivity(
			this.notifier,
			activity,
			this.logger,
		);
		return { result, notification };
	}
}
