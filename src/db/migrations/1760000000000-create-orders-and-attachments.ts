import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateOrdersAndAttachments1760000000000 implements MigrationInterface {
    name = 'CreateOrdersAndAttachments1760000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "orders" ("id" SERIAL NOT NULL, "external_id" bigint, "link" text NOT NULL, "title" text NOT NULL, "summary" text, "pub_date" TIMESTAMP WITH TIME ZONE, "rss_raw" jsonb NOT NULL DEFAULT '{}'::jsonb, "enriched_json" jsonb NOT NULL DEFAULT '{}'::jsonb, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_orders_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_orders_external_id" ON "orders" ("external_id")`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_orders_link" ON "orders" ("link")`);
        await queryRunner.query(`CREATE TABLE "attachments" ("id" SERIAL NOT NULL, "order_id" integer NOT NULL, "filename" text NOT NULL, "stored_path" text NOT NULL, "size_bytes" bigint NOT NULL, "mime_type" character varying(255), "original_url" text, "page_url" text, "sha256" character varying(64), "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_attachments_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_attachments_order_id" ON "attachments" ("order_id")`);
        await queryRunner.query(`ALTER TABLE "attachments" ADD CONSTRAINT "FK_attachments_order_id" FOREIGN KEY ("order_id") REFERENCES "orders"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "attachments" DROP CONSTRAINT "FK_attachments_order_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_attachments_order_id"`);
        await queryRunner.query(`DROP TABLE "attachments"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_orders_link"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_orders_external_id"`);
        await queryRunner.query(`DROP TABLE "orders"`);
    }

}
