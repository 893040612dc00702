import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";
import { bigintTransformer } from "../../common/fixed-point";

@Entity("user_balances")
export class UserBalance {
	@PrimaryColumn({ type: "text" })
	user!: string;

	@PrimaryColumn({ type: "text" })
	asset!: string;

	@Column({ type: "text", transformer: bigintTransformer, default: "0" })
	depositedAmount!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
