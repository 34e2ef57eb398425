import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Relation } from "typeorm";
import type { AttachmentRecord } from "../../types/records";
import { bigintTransformer } from "../transformers";
import { OrderEntity } from "./order.entity";

/**
 * Attachment Entity
 *
 * A file uploaded for an order. The bytes live on disk at `stored_path`;
 * rows are removed together with their order.
 */
@Entity({ name: "attachments" })
export class AttachmentEntity implements AttachmentRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "integer", name: "order_id" })
    order_id!: number;

    @ManyToOne(() => OrderEntity, order => order.attachments, { onDelete: "CASCADE" })
    @JoinColumn({ name: "order_id" })
    order!: Relation<OrderEntity>;

    @Column({ type: "text" })
    filename!: string;

    @Column({ type: "text" })
    stored_path!: string;

    @Column({ type: "bigint", transformer: bigintTransformer })
    size_bytes!: number;

    @Column({ type: "varchar", length: 255, nullable: true })
    mime_type!: string | null;

    @Column({ type: "text", nullable: true })
    original_url!: string | null;

    @Column({ type: "text", nullable: true })
    page_url!: string | null;

    @Column({ type: "varchar", length: 64, nullable: true })
    sha256!: string | null;

    @CreateDateColumn({ type: "timestamptz", name: "created_at" })
    created_at!: Date;
}
