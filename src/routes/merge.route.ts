import { Router } from "express";
import { AppConfig } from "../config/app.config";
import { exportController, mergeController, mergeFilesController } from "../controllers/merge.controller";

export function mergeRouter(config: AppConfig): Router {
    const router = Router();

    router.post("/merge", mergeController(config));
    router.post("/merge/export", exportController(config));
    router.post("/merge/files", mergeFilesController(config));

    return router;
}
