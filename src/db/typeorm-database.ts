import { DataSource, EntityManager, QueryFailedError, Repository } from "typeorm";
import {
    AttachmentRecord,
    FeedbackStatus,
    NewAttachment,
    NewOrder,
    NewOrderFeedback,
    NewUser,
    NewUserAttachment,
    OrderFeedbackRecord,
    OrderRecord,
    OrderWithAttachments,
    UserAttachmentRecord,
    UserRecord,
    UserWithAttachments
} from "../types/records";
import {
    DuplicateRecordError,
    IAttachmentRepository,
    IDatabase,
    IFeedbackRepository,
    IOrderRepository,
    IUserAttachmentRepository,
    IUserRepository,
    OrderChanges,
    OrderListQuery,
    Page,
    Stores,
    UserChanges
} from "./interfaces";
import { OrderEntity } from "./entities/order.entity";
import { AttachmentEntity } from "./entities/attachment.entity";
import { UserEntity } from "./entities/user.entity";
import { UserAttachmentEntity } from "./entities/user-attachment.entity";
import { OrderFeedbackEntity } from "./entities/order-feedback.entity";

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
    return error instanceof QueryFailedError
        && 'code' in error.driverError
        && error.driverError.code === UNIQUE_VIOLATION;
}

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, match => `\\${match}`);
}

class TypeOrmOrderRepository implements IOrderRepository {
    constructor(private repository: Repository<OrderEntity>) { }

    findById(id: number): Promise<OrderRecord | null> {
        return this.repository.findOneBy({ id });
    }

    findByExternalId(externalId: number): Promise<OrderRecord | null> {
        return this.repository.findOneBy({ external_id: externalId });
    }

    findByLink(link: string): Promise<OrderRecord | null> {
        return this.repository.findOneBy({ link });
    }

    insert(order: NewOrder): Promise<OrderRecord> {
        return this.repository.save(this.repository.create(order));
    }

    async update(id: number, changes: OrderChanges): Promise<OrderRecord> {
        const order = await this.repository.findOneByOrFail({ id });
        Object.assign(order, changes);
        return this.repository.save(order);
    }

    findWithAttachments(externalId: number): Promise<OrderWithAttachments | null> {
        return this.repository.findOne({
            where: { external_id: externalId },
            relations: { attachments: true },
            order: { attachments: { id: 'ASC' } }
        });
    }

    list(query: OrderListQuery): Promise<OrderWithAttachments[]> {
        const builder = this.repository
            .createQueryBuilder('o')
            .leftJoinAndSelect('o.attachments', 'attachment')
            .orderBy('o.updated_at', 'DESC')
            .addOrderBy('o.id', 'DESC')
            .addOrderBy('attachment.id', 'ASC')
            .skip(query.offset)
            .take(query.limit);

        if (query.q) {
            builder.andWhere('(o.title ILIKE :pattern OR o.summary ILIKE :pattern)', {
                pattern: `%${escapeLike(query.q)}%`
            });
        }

        if (query.hasAttachments === true) {
            builder.andWhere('EXISTS (SELECT 1 FROM attachments a WHERE a.order_id = o.id)');
        } else if (query.hasAttachments === false) {
            builder.andWhere('NOT EXISTS (SELECT 1 FROM attachments a WHERE a.order_id = o.id)');
        }

        return builder.getMany();
    }
}

class TypeOrmAttachmentRepository implements IAttachmentRepository {
    constructor(private repository: Repository<AttachmentEntity>) { }

    insert(attachment: NewAttachment): Promise<AttachmentRecord> {
        return this.repository.save(this.repository.create(attachment));
    }
}

class TypeOrmUserRepository implements IUserRepository {
    constructor(private repository: Repository<UserEntity>) { }

    findByUid(uid: string): Promise<UserRecord | null> {
        return this.repository.findOneBy({ uid });
    }

    insert(user: Omit<NewUser, 'uid'>): Promise<UserRecord> {
        return this.repository.save(this.repository.create(user));
    }

    async update(uid: string, changes: UserChanges): Promise<UserRecord> {
        const user = await this.repository.findOneByOrFail({ uid });
        Object.assign(user, changes);
        return this.repository.save(user);
    }

    findWithAttachments(uid: string): Promise<UserWithAttachments | null> {
        return this.repository.findOne({
            where: { uid },
            relations: { attachments: true },
            order: { attachments: { created_at: 'ASC', id: 'ASC' } }
        });
    }
}

class TypeOrmUserAttachmentRepository implements IUserAttachmentRepository {
    constructor(private repository: Repository<UserAttachmentEntity>) { }

    insert(attachment: NewUserAttachment): Promise<UserAttachmentRecord> {
        return this.repository.save(this.repository.create(attachment));
    }
}

class TypeOrmFeedbackRepository implements IFeedbackRepository {
    constructor(private repository: Repository<OrderFeedbackEntity>) { }

    findById(id: number): Promise<OrderFeedbackRecord | null> {
        return this.repository.findOneBy({ id });
    }

    findByOrderAndUser(orderId: number, userId: string): Promise<OrderFeedbackRecord | null> {
        return this.repository.findOneBy({ order_id: orderId, user_id: userId });
    }

    async insert(feedback: NewOrderFeedback): Promise<OrderFeedbackRecord> {
        try {
            return await this.repository.save(this.repository.create(feedback));
        } catch (error: unknown) {
            if (isUniqueViolation(error)) {
                throw new DuplicateRecordError(
                    `Feedback for order ${feedback.order_id} by user ${feedback.user_id} already exists`
                );
            }
            throw error;
        }
    }

    listByOrder(orderId: number, page: Page): Promise<OrderFeedbackRecord[]> {
        return this.repository.find({
            where: { order_id: orderId },
            order: { created_at: 'DESC', id: 'DESC' },
            skip: page.offset,
            take: page.limit
        });
    }

    listByUser(userId: string, page: Page): Promise<OrderFeedbackRecord[]> {
        return this.repository.find({
            where: { user_id: userId },
            order: { created_at: 'DESC', id: 'DESC' },
            skip: page.offset,
            take: page.limit
        });
    }

    async updateStatus(id: number, status: FeedbackStatus): Promise<OrderFeedbackRecord> {
        const feedback = await this.repository.findOneByOrFail({ id });
        feedback.status = status;
        return this.repository.save(feedback);
    }

    async delete(id: number): Promise<void> {
        await this.repository.delete({ id });
    }
}

function storesFor(manager: EntityManager): Stores {
    return {
        orders: new TypeOrmOrderRepository(manager.getRepository(OrderEntity)),
        attachments: new TypeOrmAttachmentRepository(manager.getRepository(AttachmentEntity)),
        users: new TypeOrmUserRepository(manager.getRepository(UserEntity)),
        userAttachments: new TypeOrmUserAttachmentRepository(manager.getRepository(UserAttachmentEntity)),
        feedbacks: new TypeOrmFeedbackRepository(manager.getRepository(OrderFeedbackEntity))
    };
}

/**
 * TypeORM Database
 *
 * Repository implementations over an initialized DataSource. Outside a
 * transaction every call auto-commits.
 */
export class TypeOrmDatabase implements IDatabase {
    readonly orders: IOrderRepository;
    readonly attachments: IAttachmentRepository;
    readonly users: IUserRepository;
    readonly userAttachments: IUserAttachmentRepository;
    readonly feedbacks: IFeedbackRepository;

    constructor(private dataSource: DataSource) {
        const stores = storesFor(dataSource.manager);
        this.orders = stores.orders;
        this.attachments = stores.attachments;
        this.users = stores.users;
        this.userAttachments = stores.userAttachments;
        this.feedbacks = stores.feedbacks;
    }

    transaction<T>(work: (stores: Stores) => Promise<T>): Promise<T> {
        return this.dataSource.transaction(manager => work(storesFor(manager)));
    }
}
