import { Request, Response, Router } from "express";
import { ILogger } from "../config/logger";
import { Settings } from "../config/settings";
import { UploadDispatcher } from "../services/upload-dispatcher.service";
import { UploadService } from "../services/upload.service";
import { handleRouteError } from "../utils/http-error";
import { createMultipartCapture, createRawBody, toUploadRequestView } from "./multipart";

export interface UploadRouteDeps {
    settings: Settings;
    logger: ILogger;
    dispatcher: UploadDispatcher;
    uploadService: UploadService;
}

export function createUploadRoutes({ settings, logger, dispatcher, uploadService }: UploadRouteDeps): Router {
    const router = Router();

    /**
     * POST /api/upload
     * POST /api/upload_file
     *
     * Unified endpoint for the automation agent. Accepts multipart,
     * JSON or url-encoded bodies and decides from the fields whether the
     * request carries project metadata or a file attachment.
     *
     * Metadata: `projectData` (JSON object, or the whole JSON body)
     * Attachment: `file` plus optional `project_id`, `page_url`,
     * `original_url`, `filename`; or `type=attachment`
     *
     * Returns: { status, mode: "metadata", order } | { status, mode: "attachment", file, order }
     */
    const handleUpload = async (req: Request, res: Response) => {
        try {
            const intent = dispatcher.dispatch(toUploadRequestView(req));
            logger.debug({ mode: intent.mode, path: req.path }, 'Upload intent resolved');

            const result = await uploadService.handle(intent);
            res.json(result);

        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Upload failed');
        }
    };

    router.post(
        ['/upload', '/upload_file'],
        createMultipartCapture(settings),
        createRawBody(settings),
        handleUpload
    );

    return router;
}
