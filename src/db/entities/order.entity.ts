import { Column, CreateDateColumn, Entity, Index, OneToMany, PrimaryGeneratedColumn, Relation, UpdateDateColumn } from "typeorm";
import type { JsonObject } from "../../types/json";
import type { OrderRecord } from "../../types/records";
import { bigintTransformer } from "../transformers";
import { AttachmentEntity } from "./attachment.entity";

/**
 * Order Entity
 *
 * A freelance job posting. Identified by `external_id` when the marketplace
 * id is known, otherwise by `link`; both are unique.
 *
 * Lifecycle:
 * 1. Created on the first RSS sighting, or by an upload for an unseen project
 * 2. RSS sightings overwrite title, summary, pub_date and rss_raw
 * 3. Uploads deep-merge into enriched_json
 */
@Entity({ name: "orders" })
export class OrderEntity implements OrderRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index("IDX_orders_external_id", { unique: true })
    @Column({
        type: "bigint",
        nullable: true,
        transformer: bigintTransformer
    })
    external_id!: number | null;

    @Index("IDX_orders_link", { unique: true })
    @Column({ type: "text" })
    link!: string;

    @Column({ type: "text" })
    title!: string;

    @Column({ type: "text", nullable: true })
    summary!: string | null;

    @Column({ type: "timestamptz", nullable: true })
    pub_date!: Date | null;

    @Column({ type: "jsonb", default: () => "'{}'::jsonb" })
    rss_raw!: JsonObject; // Feed entry as received, plus extracted_links

    @Column({ type: "jsonb", default: () => "'{}'::jsonb" })
    enriched_json!: JsonObject; // Accumulated agent uploads

    @OneToMany(() => AttachmentEntity, attachment => attachment.order)
    attachments!: Relation<AttachmentEntity[]>;

    @CreateDateColumn({ type: "timestamptz", name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ type: "timestamptz", name: "updated_at" })
    updated_at!: Date;
}
