import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateUsers1760000100000 implements MigrationInterface {
    name = 'CreateUsers1760000100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "users" ("uid" uuid NOT NULL DEFAULT gen_random_uuid(), "competencies_text" text, "categories" text array, "meta" jsonb, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_users_uid" PRIMARY KEY ("uid"))`);
        await queryRunner.query(`CREATE TABLE "user_attachments" ("id" SERIAL NOT NULL, "user_uid" uuid NOT NULL, "filename" text NOT NULL, "stored_path" text NOT NULL, "size" bigint NOT NULL, "sha256" character varying(64) NOT NULL, "content_type" character varying(255), "meta" jsonb, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_user_attachments_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_user_attachments_user_uid" ON "user_attachments" ("user_uid")`);
        await queryRunner.query(`ALTER TABLE "user_attachments" ADD CONSTRAINT "FK_user_attachments_user_uid" FOREIGN KEY ("user_uid") REFERENCES "users"("uid") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "user_attachments" DROP CONSTRAINT "FK_user_attachments_user_uid"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_user_attachments_user_uid"`);
        await queryRunner.query(`DROP TABLE "user_attachments"`);
        await queryRunner.query(`DROP TABLE "users"`);
    }

}
