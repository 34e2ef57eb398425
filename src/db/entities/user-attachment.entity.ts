import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Relation } from "typeorm";
import type { JsonObject } from "../../types/json";
import type { UserAttachmentRecord } from "../../types/records";
import { bigintTransformer } from "../transformers";
import { UserEntity } from "./user.entity";

@Entity({ name: "user_attachments" })
export class UserAttachmentEntity implements UserAttachmentRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "uuid", name: "user_uid" })
    user_uid!: string;

    @ManyToOne(() => UserEntity, user => user.attachments, { onDelete: "CASCADE" })
    @JoinColumn({ name: "user_uid" })
    user!: Relation<UserEntity>;

    @Column({ type: "text" })
    filename!: string;

    @Column({ type: "text" })
    stored_path!: string;

    @Column({ type: "bigint", transformer: bigintTransformer })
    size!: number;

    @Column({ type: "varchar", length: 64 })
    sha256!: string;

    @Column({ type: "varchar", length: 255, nullable: true })
    content_type!: string | null;

    @Column({ type: "jsonb", nullable: true })
    meta!: JsonObject | null;

    @CreateDateColumn({ type: "timestamptz", name: "created_at" })
    created_at!: Date;
}
