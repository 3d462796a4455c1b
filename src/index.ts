import { AppConfig, loadConfig } from "./config/app.config";
import { createApp } from "./app";

function _loadConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (err) {
        console.error("[STARTUP] Configuration rejected — aborting server start.", err);
        process.exit(1);
    }
}

function main() {
    const config = _loadConfig();
    const app = createApp(config);

    app.listen(config.port, () => {
        console.log(`[STARTUP] Contacts merger listening on port ${config.port}`);
        console.log(`[STARTUP] Input dir: ${config.inputDir}, output dir: ${config.outputDir}`);
    });
}

main();
