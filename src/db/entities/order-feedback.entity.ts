import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Relation, Unique, UpdateDateColumn } from "typeorm";
import type { FeedbackStatus, OrderFeedbackRecord } from "../../types/records";
import { OrderEntity } from "./order.entity";
import { UserEntity } from "./user.entity";

/**
 * OrderFeedback Entity
 *
 * A freelancer's response to an order. At most one per (order, user) pair.
 *
 * Status Flow:
 * pending → accepted | rejected
 */
@Entity({ name: "order_feedbacks" })
@Unique("uq_order_feedback_order_user", ["order_id", "user_id"])
export class OrderFeedbackEntity implements OrderFeedbackRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "integer", name: "order_id" })
    order_id!: number;

    @ManyToOne(() => OrderEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "order_id" })
    order!: Relation<OrderEntity>;

    @Column({ type: "uuid", name: "user_id" })
    user_id!: string;

    @ManyToOne(() => UserEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "user_id" })
    user!: Relation<UserEntity>;

    @Column({ type: "text" })
    feedback_text!: string;

    @Column({
        type: "varchar",
        length: 20,
        default: "pending"
    })
    status!: FeedbackStatus;

    @CreateDateColumn({ type: "timestamptz", name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ type: "timestamptz", name: "updated_at" })
    updated_at!: Date;
}
