import { Request, Response, Router } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { Settings } from "../config/settings";
import { UploadDispatcher } from "../services/upload-dispatcher.service";
import { parseUid, UsersService } from "../services/users.service";
import { isJsonObject, JsonObject, jsonValueSchema } from "../types/json";
import { UserAttachmentRecord, UserWithAttachments } from "../types/records";
import { HttpError, handleRouteError } from "../utils/http-error";
import { createMultipartCapture, toUploadRequestView } from "./multipart";

const userPatchSchema = z.object({
    competencies_text: z.string().nullable().optional(),
    categories: z.array(z.string()).nullable().optional()
});

export interface UsersRouteDeps {
    settings: Settings;
    logger: ILogger;
    dispatcher: UploadDispatcher;
    usersService: UsersService;
}

function readMeta(body: unknown): JsonObject | null {
    if (typeof body !== 'object' || body === null || !('meta' in body)) {
        return null;
    }
    const meta = body.meta;
    if (meta === null || meta === undefined) {
        return null;
    }
    const parsed = jsonValueSchema.safeParse(meta);
    if (!parsed.success || !isJsonObject(parsed.data)) {
        throw HttpError.badRequest('meta must be an object');
    }
    return parsed.data;
}

export function toUserAttachmentResponse(attachment: UserAttachmentRecord) {
    return {
        id: attachment.id,
        filename: attachment.filename,
        stored_path: attachment.stored_path,
        size: attachment.size,
        sha256: attachment.sha256,
        content_type: attachment.content_type,
        created_at: attachment.created_at
    };
}

function toUserResponse(user: UserWithAttachments) {
    return {
        uid: user.uid,
        competencies_text: user.competencies_text,
        categories: user.categories,
        attachments: user.attachments.map(toUserAttachmentResponse),
        created_at: user.created_at,
        updated_at: user.updated_at
    };
}

export function createUsersRoutes({ settings, logger, dispatcher, usersService }: UsersRouteDeps): Router {
    const router = Router();

    /**
     * POST /api/users
     *
     * Creates a profile and returns its generated id.
     * Body (optional): { meta: object }
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const result = await usersService.createUser(readMeta(req.body));
            res.json(result);
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'User creation failed');
        }
    });

    /**
     * GET /api/users/:uid
     *
     * Profile with all uploaded attachments, oldest first.
     */
    router.get('/:uid', async (req: Request, res: Response) => {
        try {
            const user = await usersService.getUser(parseUid(req.params.uid));
            res.json(toUserResponse(user));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'User retrieval failed');
        }
    });

    /**
     * PATCH /api/users/:uid
     *
     * Body: { competencies_text?, categories? }. Only the supplied keys
     * change; categories are normalized to lower case without duplicates.
     */
    router.patch('/:uid', async (req: Request, res: Response) => {
        try {
            const uid = parseUid(req.params.uid);
            const patch = userPatchSchema.parse(req.body ?? {});
            const user = await usersService.updateUser(uid, patch);
            res.json(toUserResponse(user));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'User update failed');
        }
    });

    /**
     * POST /api/users/:uid/files
     *
     * Multipart upload of portfolio files under `files` or `files[]`.
     * Returns the created attachment records.
     */
    router.post('/:uid/files', createMultipartCapture(settings), async (req: Request, res: Response) => {
        try {
            const uid = parseUid(req.params.uid);
            const files = dispatcher.userFiles(toUploadRequestView(req));
            const attachments = await usersService.addUserAttachments(uid, files);
            res.json(attachments.map(toUserAttachmentResponse));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'User file upload failed');
        }
    });

    return router;
}
