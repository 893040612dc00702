import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AccessGate, AdminAction } from "./access-gate";

const RISK_MANAGER_ACTIONS: ReadonlySet<AdminAction> = new Set([
	"pool.set-risk",
	"pool.set-flags",
	"pool.pause",
	"protocol.pause",
	"curve.set",
	"stats.read",
]);

function parseAccounts(raw: string | undefined): Set<string> {
	return new Set(
		(raw ?? "")
			.split(",")
			.map((a) => a.trim())
			.filter((a) => a.length > 0),
	);
}

/**
 * Roles read from LENDING_ADMINS (every action) and LENDING_RISK_MANAGERS
 * (risk parameters, curves, pausing and stats), both comma separated.
 */
@Injectable()
export class ConfigAccessGate implements AccessGate {
	private readonly logger = new Logger(ConfigAccessGate.name);
	private readonly admins: Set<string>;
	private readonly riskManagers: Set<string>;

	constructor(configService: ConfigService) {
		this.admins = parseAccounts(configService.get<string>("LENDING_ADMINS"));
		this.riskManagers = parseAccounts(
			configService.get<string>("LENDING_RISK_MANAGERS"),
		);
		if (this.admins.size === 0) {
			this.logger.warn("LENDING_ADMINS is empty, admin actions are disabled");
		}
	}

	async authorize(caller: string, action: AdminAction): Promise<boolean> {
		if (this.admins.has(caller)) {
			return true;
		}
		return this.riskManagers.has(caller) && RISK_MANAGER_ACTIONS.has(action);
	}
}
