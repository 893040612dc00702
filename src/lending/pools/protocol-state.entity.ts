import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

export const PROTOCOL_STATE_ID = 1;

@Entity("protocol_state")
export class ProtocolState {
	@PrimaryColumn({ type: "integer" })
	id!: number;

	@Column({ type: "boolean", default: false })
	paused!: boolean;

	@UpdateDateColumn()
	updatedAt!: Date;
}
