import "reflect-metadata";
import fs from "fs";
import { config } from "dotenv";
import { createApp } from "./app";
import { createLogger } from "./config/logger";
import { loadSettings } from "./config/settings";
import { createDataSource } from "./db/data-source";
import { TypeOrmDatabase } from "./db/typeorm-database";
import { FeedbacksService } from "./services/feedbacks.service";
import { OrdersService } from "./services/orders.service";
import { RssIngestService } from "./services/rss-ingest.service";
import { StagehandService } from "./services/stagehand.service";
import { StorageService } from "./services/storage.service";
import { UploadDispatcher } from "./services/upload-dispatcher.service";
import { UploadService } from "./services/upload.service";
import { UsersService } from "./services/users.service";

// Load environment variables
config();

const settings = loadSettings();
const logger = createLogger(settings.logLevel);

// Initialize database and start server
async function startServer() {
    try {
        await fs.promises.mkdir(settings.uploadDir, { recursive: true, mode: 0o755 });

        const dataSource = createDataSource(settings);
        await dataSource.initialize();
        logger.info("Database connection established");

        const applied = await dataSource.runMigrations();
        logger.info({ migrations: applied.map(migration => migration.name) }, "Database migrations applied");

        const database = new TypeOrmDatabase(dataSource);
        const storage = new StorageService(settings, logger);
        const ordersService = new OrdersService(logger);

        const app = createApp({
            settings,
            logger,
            database,
            dispatcher: new UploadDispatcher(logger),
            ordersService,
            uploadService: new UploadService(database, ordersService, storage, logger),
            ingestService: new RssIngestService(database, ordersService, settings, logger),
            usersService: new UsersService(database, storage, logger),
            feedbacksService: new FeedbacksService(database, logger),
            stagehandService: new StagehandService(settings, logger)
        });

        app.listen(settings.port, () => {
            logger.info({
                port: settings.port,
                uploadDir: settings.uploadDir,
                maxUploadMb: settings.maxUploadMb,
                feedUrl: settings.rssFeedUrl
            }, `Server running at http://localhost:${settings.port}`);
        });
    } catch (error: unknown) {
        logger.error({ err: error }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
