import { Inject, Injectable, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { LendingException } from "../../common/errors";
import {
	BPS,
	PRECISION,
	SECONDS_PER_YEAR,
	mulDiv,
} from "../../common/fixed-point";
import { LENDING_CONFIG, LendingConfig } from "../../config/lending.config";
import {
	CurveParameters,
	DEFAULT_CURVE_SCOPE,
	InterestRateCurve,
} from "./interest-rate-curve.entity";
import { borrowRate } from "./interest-rate-model";
import { Pool, PoolSnapshot, snapshotOf } from "./pool.entity";
import { PROTOCOL_STATE_ID, ProtocolState } from "./protocol-state.entity";
import { UserBalance } from "./user-balance.entity";

export type PoolAccrual = {
	elapsed: number;
	interest: bigint;
	reserves: bigint;
};

/**
 * Interest owed by a pool's borrowers since its last update:
 * totalBorrows * borrowRate * elapsed / (SECONDS_PER_YEAR * PRECISION),
 * with reserveFactorBps of it kept as reserves.
 *
 * Applying an accrual adds the interest to both totalBorrows and
 * totalDeposits, so totalDeposits - totalBorrows is unchanged by it.
 * Reserves are the protocol's claim within totalDeposits; depositors are
 * left with interest - reserves.
 */
export function computePoolAccrual(
	pool: PoolSnapshot,
	curve: CurveParameters,
	now: number,
): PoolAccrual {
	const elapsed = now - pool.lastUpdateTime;
	if (elapsed <= 0 || pool.totalBorrows === 0n) {
		return { elapsed: Math.max(elapsed, 0), interest: 0n, reserves: 0n };
	}
	const rate = borrowRate(pool, curve);
	const interest =
		(pool.totalBorrows * rate * BigInt(elapsed)) /
		(SECONDS_PER_YEAR * PRECISION);
	const reserves = mulDiv(interest, BigInt(curve.reserveFactorBps), BPS);
	return { elapsed, interest, reserves };
}

/**
 * Owns pool aggregates, depositor balances, rate curves and the protocol
 * pause flag. Every method takes the EntityManager of the caller's
 * transaction.
 */
@Injectable()
export class PoolLedgerService {
	private readonly logger = new Logger(PoolLedgerService.name);

	constructor(@Inject(LENDING_CONFIG) private readonly config: LendingConfig) {}

	async findPool(manager: EntityManager, asset: string): Promise<Pool> {
		const pool = await manager.findOne(Pool, { where: { asset } });
		if (!pool) {
			throw new LendingException(
				"AssetNotSupported",
				`Asset ${asset} is not listed`,
			);
		}
		return pool;
	}

	async listPools(manager: EntityManager): Promise<Pool[]> {
		return manager.find(Pool, { order: { asset: "ASC" } });
	}

	async getCurve(
		manager: EntityManager,
		asset: string,
	): Promise<CurveParameters> {
		const curves = await manager.find(InterestRateCurve, {
			where: [{ scope: asset }, { scope: DEFAULT_CURVE_SCOPE }],
		});
		return (
			curves.find((c) => c.scope === asset) ??
			curves.find((c) => c.scope === DEFAULT_CURVE_SCOPE) ??
			this.config.defaultCurve
		);
	}

	async isProtocolPaused(manager: EntityManager): Promise<boolean> {
		const state = await manager.findOne(ProtocolState, {
			where: { id: PROTOCOL_STATE_ID },
		});
		return state?.paused ?? false;
	}

	async assertProtocolOpen(manager: EntityManager): Promise<void> {
		if (await this.isProtocolPaused(manager)) {
			throw new LendingException("ProtocolPaused", "Protocol is paused");
		}
	}

	assertPoolUsable(pool: Pool): void {
		if (!pool.isActive) {
			throw new LendingException(
				"PoolInactive",
				`Pool ${pool.asset} is not active`,
			);
		}
		if (pool.isPaused) {
			throw new LendingException("PoolInactive", `Pool ${pool.asset} is paused`);
		}
	}

	/**
	 * Brings the pool's totals and reserves up to `now`. Calling it again at
	 * the same timestamp adds nothing.
	 */
	async accrue(
		manager: EntityManager,
		pool: Pool,
		now: number,
	): Promise<PoolAccrual> {
		const curve = await this.getCurve(manager, pool.asset);
		const accrual = computePoolAccrual(snapshotOf(pool), curve, now);
		if (accrual.elapsed === 0) {
			return accrual;
		}
		applyAccrual(pool, accrual, now);
		await manager.save(Pool, pool);
		if (accrual.interest > 0n) {
			this.logger.debug(
				`Accrued ${accrual.interest} on ${pool.asset} over ${accrual.elapsed}s (reserves +${accrual.reserves})`,
			);
		}
		return accrual;
	}

	async getBalance(
		manager: EntityManager,
		user: string,
		asset: string,
	): Promise<bigint> {
		const balance = await manager.findOne(UserBalance, {
			where: { user, asset },
		});
		return balance?.depositedAmount ?? 0n;
	}

	async listBalances(
		manager: EntityManager,
		user: string,
	): Promise<UserBalance[]> {
		return manager.find(UserBalance, {
			where: { user },
			order: { asset: "ASC" },
		});
	}

	async deposit(
		manager: EntityManager,
		user: string,
		asset: string,
		amount: bigint,
		now: number,
	): Promise<{ pool: Pool; balance: bigint }> {
		assertPositive(amount);
		const pool = await this.findPool(manager, asset);
		this.assertPoolUsable(pool);
		if (!pool.depositsEnabled) {
			throw new LendingException(
				"DepositsDisabled",
				`Deposits are disabled for ${asset}`,
			);
		}
		await this.accrue(manager, pool, now);

		const balance = (await this.getBalance(manager, user, asset)) + amount;
		await manager.save(UserBalance, { user, asset, depositedAmount: balance });
		pool.totalDeposits += amount;
		await manager.save(Pool, pool);

		this.logger.log(`Deposit of ${amount} ${asset} by ${user}`);
		return { pool, balance };
	}

	async withdraw(
		manager: EntityManager,
		user: string,
		asset: string,
		amount: bigint,
		now: number,
	): Promise<{ pool: Pool; balance: bigint }> {
		assertPositive(amount);
		const pool = await this.findPool(manager, asset);
		if (pool.isPaused) {
			throw new LendingException("PoolInactive", `Pool ${asset} is paused`);
		}
		const current = await this.getBalance(manager, user, asset);
		if (amount > current) {
			throw new LendingException(
				"InsufficientBalance",
				`Withdrawal of ${amount} exceeds balance ${current}`,
			);
		}
		await this.accrue(manager, pool, now);

		const available = availableLiquidity(pool);
		if (amount > available) {
			throw new LendingException(
				"InsufficientLiquidity",
				`Withdrawal of ${amount} exceeds available liquidity ${available}`,
			);
		}

		const balance = current - amount;
		await manager.save(UserBalance, { user, asset, depositedAmount: balance });
		pool.totalDeposits -= amount;
		await manager.save(Pool, pool);

		this.logger.log(`Withdrawal of ${amount} ${asset} by ${user}`);
		return { pool, balance };
	}

	/** Moves newly lent principal into the borrow total. */
	async recordBorrow(
		manager: EntityManager,
		pool: Pool,
		amount: bigint,
	): Promise<void> {
		pool.totalBorrows += amount;
		await manager.save(Pool, pool);
	}

	/**
	 * Takes repaid principal out of the borrow total. Interest is not
	 * subtracted: it entered the total through accrual, not through lending.
	 */
	async recordPrincipalRepaid(
		manager: EntityManager,
		pool: Pool,
		principal: bigint,
	): Promise<void> {
		if (principal > pool.totalBorrows) {
			throw new Error(
				`Repaid principal ${principal} exceeds ${pool.asset} borrows ${pool.totalBorrows}`,
			);
		}
		pool.totalBorrows -= principal;
		await manager.save(Pool, pool);
	}

	async withdrawReserves(
		manager: EntityManager,
		pool: Pool,
		amount: bigint,
		now: number,
	): Promise<Pool> {
		assertPositive(amount);
		await this.accrue(manager, pool, now);
		if (amount > pool.totalReserves) {
			throw new LendingException(
				"InsufficientReserves",
				`Requested ${amount} exceeds ${pool.asset} reserves ${pool.totalReserves}`,
			);
		}
		const available = availableLiquidity(pool);
		if (amount > available) {
			throw new LendingException(
				"InsufficientLiquidity",
				`Reserve withdrawal of ${amount} exceeds available liquidity ${available}`,
			);
		}
		pool.totalReserves -= amount;
		pool.totalDeposits -= amount;
		return manager.save(Pool, pool);
	}
}

export function applyAccrual(
	pool: Pick<
		Pool,
		"totalDeposits" | "totalBorrows" | "totalReserves" | "lastUpdateTime"
	>,
	accrual: PoolAccrual,
	now: number,
): void {
	pool.totalBorrows += accrual.interest;
	pool.totalDeposits += accrual.interest;
	pool.totalReserves += accrual.reserves;
	pool.lastUpdateTime = now;
}

/** Deposits not currently lent out; never negative. */
export function availableLiquidity(
	pool: Pick<Pool, "totalDeposits" | "totalBorrows">,
): bigint {
	return pool.totalDeposits > pool.totalBorrows
		? pool.totalDeposits - pool.totalBorrows
		: 0n;
}

export function assertPositive(amount: bigint): void {
	if (amount <= 0n) {
		throw new LendingException("ZeroAmount", "Amount must be greater than zero");
	}
}
