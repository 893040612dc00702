export const ACCESS_GATE = Symbol("ACCESS_GATE");

export const ADMIN_ACTIONS = [
	"asset.list",
	"asset.delist",
	"pool.set-risk",
	"pool.set-flags",
	"pool.pause",
	"protocol.pause",
	"curve.set",
	"reserves.withdraw",
	"price.set",
	"stats.read",
] as const;
export type AdminAction = (typeof ADMIN_ACTIONS)[number];

export interface AccessGate {
	authorize(caller: string, action: AdminAction): Promise<boolean>;
}
