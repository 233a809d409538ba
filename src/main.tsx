import { render } from "ink";
import packageJson from "../package.json";
import { createEffects } from "./commands/effects";
import { App } from "./components/App";
import { ErrorBoundary } from "./components/ErrorBoundary";
import { loadConfig } from "./config/app-config";
import { AppStateProvider } from "./contexts/AppStateContext";
import { runShell, setInkInstance, unmountInk } from "./ink-control";
import { Program } from "./runtime/scheduler";
import { DockerClient } from "./services/docker-client";
import { GroupStore } from "./services/group-store";
import { type DockerEndpoint, endpointKey, httpClientManager, parseDockerHost } from "./services/http-client";
import { initializeLogger, log } from "./services/logger";
import { initialAppState } from "./state/app-state";
import { createReducer, startupCommands } from "./state/app-reducer";
import type { AppEvent } from "./types/events";

function setupAlternateScreen() {
    const out = process.stdout;
    if (!out.isTTY) return;

    let cleaned = false;
    const disable = () => {
        if (cleaned) return;
        cleaned = true;
        out.write("\u001B[?1049l");
    };

    out.write("\u001B[?1049h");

    process.on("exit", disable);
    process.on("SIGTERM", () => {
        disable();
        process.exit(143);
    });
    process.on("SIGHUP", () => {
        disable();
        process.exit(129);
    });
    process.on("uncaughtException", (err) => {
        disable();
        log.error("Uncaught exception", "main", { message: err.message, stack: err.stack });
        console.error(err);
        process.exit(1);
    });
    process.on("unhandledRejection", (reason) => {
        disable();
        log.error("Unhandled rejection", "main", { reason: String(reason) });
        console.error(reason);
        process.exit(1);
    });
}

function fail(message: string): never {
    console.error(`dockhand: ${message}`);
    process.exit(1);
}

function parseEndpoint(host: string): DockerEndpoint {
    try {
        return parseDockerHost(host);
    } catch {
        fail(`invalid docker host: ${host}`);
    }
}

async function main() {
    const configResult = await loadConfig();
    if (configResult.isErr()) {
        fail(`${configResult.error.path}: ${configResult.error.message}`);
    }
    const config = configResult.value;

    const loggerResult = await initializeLogger();
    if (loggerResult.isErr()) {
        fail(`failed to initialize logger: ${loggerResult.error.message}`);
    }
    const logger = loggerResult.value;

    const endpoint = parseEndpoint(config.dockerHost);
    const dockerHost = endpointKey(endpoint);
    const client = DockerClient.connect(endpoint);

    const pinged = await client.ping();
    if (pinged.isErr()) {
        log.error("Docker daemon unreachable", "main", { dockerHost, message: pinged.error.message });
        fail(`cannot reach the Docker daemon at ${dockerHost}: ${pinged.error.message}`);
    }

    log.info("dockhand session started", "main", {
        sessionId: logger.getSessionId(),
        logFile: logger.getLogFilePath(),
        dockerHost,
    });

    const settings = {
        logBufferLines: config.logBufferLines,
        statsHistory: config.statsHistory,
        refreshIntervalMs: config.refreshIntervalMs,
    };
    const effects = createEffects({
        client,
        groups: new GroupStore(config.groupsFile),
        config,
        shell: (containerId) => runShell(containerId),
    });
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    const program = new Program(initialAppState(size), createReducer({ effects, settings }), {
        onCommandError: (error): AppEvent => ({ type: "command-failed", message: error.message }),
    });

    program.subscribe(() => {
        if (program.getState().ui.quitting) program.stop();
    });

    setupAlternateScreen();

    const renderApp = () =>
        render(
            <AppStateProvider program={program}>
                <ErrorBoundary onExit={() => program.stop()} logFile={logger.getLogFilePath()}>
                    <App dockerHost={dockerHost} version={packageJson.version} logFile={logger.getLogFilePath()} />
                </ErrorBoundary>
            </AppStateProvider>,
            { exitOnCtrlC: false },
        );

    setInkInstance(renderApp(), renderApp);
    program.run(startupCommands({ effects, settings }));

    await program.done();
    unmountInk();
    httpClientManager.clearClients();
    log.info("dockhand session ended", "main");
    await logger.close();
    process.exit(0);
}

main().catch((error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    log.error("Failed to start application", "main", { message: err.message, stack: err.stack });
    console.error("dockhand: failed to start:", err.message);
    process.exit(1);
});
