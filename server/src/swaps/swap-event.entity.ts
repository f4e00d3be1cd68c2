import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";

/**
 * One engine notification, kept as an audit trail beside the in-memory
 * registry.
 */
@Entity("swap_events")
export class SwapEventRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	/** Boot that wrote the row; request ids restart with each boot */
	@Index()
	@Column({ type: "text" })
	runId!: string;

	@Index()
	@Column({ type: "text" })
	type!: string;

	/** Null for config events */
	@Index()
	@Column({ type: "integer", nullable: true })
	requestId!: number | null;

	@Column({ type: "simple-json" })
	payload!: Record<string, unknown>;

	@CreateDateColumn()
	createdAt!: Date;
}
