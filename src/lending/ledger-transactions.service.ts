import { Injectable, Logger } from "@nestjs/common";
import { DataSource, EntityManager } from "typeorm";
import { RecordLockService } from "../common/record-lock.service";

// SQLite drivers share one connection, so their transactions cannot overlap.
const SINGLE_CONNECTION_DRIVERS = new Set(["sqlite", "better-sqlite3"]);
const CONNECTION_LOCK = "connection";

export const poolLock = (asset: string) => `pool:${asset}`;
export const loanLock = (loanId: number) => `loan:${loanId}`;

/**
 * Runs ledger work under exclusive record locks and inside one database
 * transaction: every mutation commits together or none does.
 */
@Injectable()
export class LedgerTransactions {
	private readonly logger = new Logger(LedgerTransactions.name);
	private readonly serializeAll: boolean;

	constructor(
		private readonly dataSource: DataSource,
		private readonly locks: RecordLockService,
	) {
		this.serializeAll = SINGLE_CONNECTION_DRIVERS.has(dataSource.options.type);
	}

	async run<T>(
		lockKeys: string[],
		work: (manager: EntityManager) => Promise<T>,
	): Promise<T> {
		const keys = this.serializeAll ? [...lockKeys, CONNECTION_LOCK] : lockKeys;
		return this.locks.withLocks(keys, async () => {
			const started = Date.now();
			const result = await this.dataSource.transaction(work);
			this.logger.verbose(
				`Committed [${lockKeys.join(", ")}] in ${Date.now() - started}ms`,
			);
			return result;
		});
	}
}
