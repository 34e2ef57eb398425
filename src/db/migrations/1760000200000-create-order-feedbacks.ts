import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateOrderFeedbacks1760000200000 implements MigrationInterface {
    name = 'CreateOrderFeedbacks1760000200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "order_feedbacks" ("id" SERIAL NOT NULL, "order_id" integer NOT NULL, "user_id" uuid NOT NULL, "feedback_text" text NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'pending', "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "uq_order_feedback_order_user" UNIQUE ("order_id", "user_id"), CONSTRAINT "PK_order_feedbacks_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_order_feedbacks_user_id" ON "order_feedbacks" ("user_id")`);
        await queryRunner.query(`ALTER TABLE "order_feedbacks" ADD CONSTRAINT "FK_order_feedbacks_order_id" FOREIGN KEY ("order_id") REFERENCES "orders"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "order_feedbacks" ADD CONSTRAINT "FK_order_feedbacks_user_id" FOREIGN KEY ("user_id") REFERENCES "users"("uid") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "order_feedbacks" DROP CONSTRAINT "FK_order_feedbacks_user_id"`);
        await queryRunner.query(`ALTER TABLE "order_feedbacks" DROP CONSTRAINT "FK_order_feedbacks_order_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_order_feedbacks_user_id"`);
        await queryRunner.query(`DROP TABLE "order_feedbacks"`);
    }

}
