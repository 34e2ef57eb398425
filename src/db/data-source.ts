import "reflect-metadata";
import path from "path";
import { DataSource } from "typeorm";
import { Settings } from "../config/settings";
import { OrderEntity } from "./entities/order.entity";
import { AttachmentEntity } from "./entities/attachment.entity";
import { UserEntity } from "./entities/user.entity";
import { UserAttachmentEntity } from "./entities/user-attachment.entity";
import { OrderFeedbackEntity } from "./entities/order-feedback.entity";

export const ENTITIES = [OrderEntity, AttachmentEntity, UserEntity, UserAttachmentEntity, OrderFeedbackEntity];

export function createDataSource(settings: Pick<Settings, 'databaseUrl'>, logging: boolean = process.env.NODE_ENV === 'development'): DataSource {
    return new DataSource({
        type: "postgres",
        url: settings.databaseUrl,
        synchronize: false,
        logging,
        entities: ENTITIES,
        migrations: [path.join(__dirname, 'migrations', '*.{ts,js}')],
    });
}
