import express, { Express, Request, Response } from "express";
import { ILogger } from "./config/logger";
import { maxUploadBytes, Settings } from "./config/settings";
import { IDatabase } from "./db/interfaces";
import { FeedbacksService } from "./services/feedbacks.service";
import { OrdersService } from "./services/orders.service";
import { RssIngestService } from "./services/rss-ingest.service";
import { StagehandService } from "./services/stagehand.service";
import { UploadDispatcher } from "./services/upload-dispatcher.service";
import { UploadService } from "./services/upload.service";
import { UsersService } from "./services/users.service";
import { createFeedbacksRoutes } from "./routes/feedbacks";
import { createIngestRoutes } from "./routes/ingest";
import { createOrdersRoutes } from "./routes/orders";
import { createParseSiteRoutes } from "./routes/parse-site";
import { createUploadRoutes } from "./routes/upload";
import { createUsersRoutes } from "./routes/users";
import { errorMiddleware } from "./utils/http-error";

export interface AppServices {
    settings: Settings;
    logger: ILogger;
    database: IDatabase;
    dispatcher: UploadDispatcher;
    ordersService: OrdersService;
    uploadService: UploadService;
    ingestService: RssIngestService;
    usersService: UsersService;
    feedbacksService: FeedbacksService;
    stagehandService: StagehandService;
}

export const ENDPOINTS = {
    "Feed Ingestion": {
        "POST /api/rss/ingest": "Fetch the RSS feed and upsert orders"
    },
    "Agent Uploads": {
        "POST /api/upload": "Upload project metadata or a file attachment",
        "POST /api/upload_file": "Alias of /api/upload"
    },
    "Orders": {
        "GET /api/orders": "List orders (q, has_attachments, limit, offset)",
        "GET /api/orders/:externalId": "Get an order with attachments"
    },
    "Users": {
        "POST /api/users": "Create a user profile",
        "GET /api/users/:uid": "Get a user profile with attachments",
        "PATCH /api/users/:uid": "Update competencies and categories",
        "POST /api/users/:uid/files": "Upload portfolio files (files / files[])"
    },
    "Feedbacks": {
        "POST /api/feedbacks": "Leave feedback on an order",
        "GET /api/feedbacks/order/:orderId": "List feedbacks for an order",
        "GET /api/feedbacks/user/:uid": "List feedbacks by a user",
        "PATCH /api/feedbacks/:id/status": "Change feedback status",
        "DELETE /api/feedbacks/:id": "Delete feedback"
    },
    "Page Analysis": {
        "POST /api/parse-site": "Extract data from a page via the Stagehand service"
    },
    "System": {
        "GET /health": "Health check",
        "GET /": "API information"
    }
} as const;

export function createApp(services: AppServices): Express {
    const { settings, logger } = services;
    const app = express();
    const bodyLimit = maxUploadBytes(settings);

    // Middleware
    app.use(express.json({ limit: bodyLimit }));
    app.use(express.urlencoded({ extended: true, limit: bodyLimit }));

    // Routes
    app.use("/api/rss", createIngestRoutes(services.ingestService, logger));
    app.use("/api", createUploadRoutes({
        settings,
        logger,
        dispatcher: services.dispatcher,
        uploadService: services.uploadService
    }));
    app.use("/api/orders", createOrdersRoutes(services.database.orders, services.ordersService, logger));
    app.use("/api/users", createUsersRoutes({
        settings,
        logger,
        dispatcher: services.dispatcher,
        usersService: services.usersService
    }));
    app.use("/api/feedbacks", createFeedbacksRoutes(services.feedbacksService, logger));
    app.use("/api", createParseSiteRoutes(services.stagehandService, logger));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Freelance Order Aggregator API",
            version: "1.0.0",
            description: "Aggregates marketplace orders from RSS and enriches them with agent uploads",
            endpoints: ENDPOINTS
        });
    });

    app.use(errorMiddleware(logger));

    return app;
}
