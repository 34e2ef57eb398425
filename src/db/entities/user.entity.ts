import { Column, CreateDateColumn, Entity, OneToMany, PrimaryGeneratedColumn, Relation, UpdateDateColumn } from "typeorm";
import type { JsonObject } from "../../types/json";
import type { UserRecord } from "../../types/records";
import { UserAttachmentEntity } from "./user-attachment.entity";

/**
 * User Entity
 *
 * A freelancer profile. `categories` is stored normalized: lower case,
 * trimmed, without blanks or duplicates.
 */
@Entity({ name: "users" })
export class UserEntity implements UserRecord {
    @PrimaryGeneratedColumn("uuid")
    uid!: string;

    @Column({ type: "text", nullable: true })
    competencies_text!: string | null;

    @Column({ type: "text", array: true, nullable: true })
    categories!: string[] | null;

    @Column({ type: "jsonb", nullable: true })
    meta!: JsonObject | null;

    @OneToMany(() => UserAttachmentEntity, attachment => attachment.user)
    attachments!: Relation<UserAttachmentEntity[]>;

    @CreateDateColumn({ type: "timestamptz", name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ type: "timestamptz", name: "updated_at" })
    updated_at!: Date;
}
