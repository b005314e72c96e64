import { EventEmitter } from "events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { runApp, currentPid, type Application } from "./app";
import { fakeEnvironment, RecordingLogger } from "./testing/fakes";
import type { Config } from "./utils/config";

const config: Config = { logLevel: "info", nodeEnv: "test", underTest: true };
const STARTING = "info: Starting Demo using Node.js 20.11.1 on host1 with PID 4321 (started by alice in /srv/app)";

function recorder() {
    const events: string[] = [];
    return {
        events,
        logger: new RecordingLogger(events),
        output: { write: (chunk: string) => events.push(`stdout: ${chunk}`) },
    };
}

class FakeProcess extends EventEmitter {
    exit = vi.fn();
}

describe("runApp", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("frames run() with starting and started messages", async () => {
        const { events, logger, output } = recorder();
        const application: Application = {
            run: () => {
                events.push("run");
            },
            banner: () => "Demo is ready",
        };

        const started = await runApp(
            () => {
                events.push("construct");
                return application;
            },
            { source: { name: "Demo" }, logger, output, config, environment: fakeEnvironment() }
        );

        expect(started.application).toBe(application);
        expect(events).toEqual([
            STARTING,
            "construct",
            "run",
            "info: Started Demo in 0 seconds",
            "stdout: Demo is ready\n",
        ]);
    });

    it("times run() with the environment clock", async () => {
        const { events, logger, output } = recorder();
        // host name lookup, then stopwatch start and stop
        const now = vi.fn().mockReturnValueOnce(0).mockReturnValueOnce(0).mockReturnValueOnce(1000).mockReturnValueOnce(2500);

        await runApp(() => ({ run: () => undefined }), {
            source: { name: "Demo" },
            logger,
            output,
            config,
            environment: fakeEnvironment({ now }),
        });

        expect(events).toEqual([STARTING, "info: Started Demo in 1.5 seconds"]);
    });

    it("waits for an asynchronous run()", async () => {
        const { events, logger, output } = recorder();

        await runApp(
            () => ({
                run: async () => {
                    await new Promise(resolve => setTimeout(resolve, 5));
                    events.push("listening");
                },
            }),
            { source: { name: "Demo" }, logger, output, config, environment: fakeEnvironment() }
        );

        expect(events).toEqual([STARTING, "listening", "info: Started Demo in 0 seconds"]);
    });

    it("prints nothing for an empty banner", async () => {
        const { events, logger, output } = recorder();

        await runApp(() => ({ run: () => undefined, banner: () => "" }), {
            source: { name: "Demo" },
            logger,
            output,
            config,
            environment: fakeEnvironment(),
        });
        await runApp(() => ({ run: () => undefined, banner: async () => null }), {
            source: { name: "Demo" },
            logger,
            output,
            config,
            environment: fakeEnvironment(),
        });

        expect(events.filter(event => event.startsWith("stdout:"))).toEqual([]);
    });

    it("propagates a failing run() without reporting it started", async () => {
        const { events, logger, output } = recorder();
        const failure = new Error("port 8080 already in use");
        const banner = vi.fn(() => "never");

        const run = runApp(
            () => ({
                run: () => {
                    throw failure;
                },
                banner,
            }),
            { source: { name: "Demo" }, logger, output, config, environment: fakeEnvironment() }
        );

        await expect(run).rejects.toBe(failure);
        expect(events).toEqual([STARTING]);
        expect(banner).not.toHaveBeenCalled();
    });

    it("propagates a failing factory", async () => {
        const { events, logger, output } = recorder();
        const failure = new Error("missing settings");

        const run = runApp(
            () => {
                throw failure;
            },
            { source: { name: "Demo" }, logger, output, config, environment: fakeEnvironment() }
        );

        await expect(run).rejects.toBe(failure);
        expect(events).toEqual([STARTING]);
    });

    it("names an application without a source", async () => {
        const { events, logger, output } = recorder();

        await runApp(() => ({ run: () => undefined }), { logger, output, config, environment: fakeEnvironment() });

        expect(events[1]).toBe("info: Started application in 0 seconds");
    });

    it("does not read LOG_* settings when given a logger", async () => {
        vi.stubEnv("LOG_LEVEL", "verbose");
        const { events, logger, output } = recorder();
        const run = vi.fn();

        await runApp(() => ({ run }), { source: { name: "Demo" }, logger, output, environment: fakeEnvironment() });

        expect(run).toHaveBeenCalledTimes(1);
        expect(events).toEqual([STARTING, "info: Started Demo in 0 seconds"]);
    });

    it("logs stopping and exits when a shutdown signal arrives", async () => {
        const { events, logger, output } = recorder();
        const target = new FakeProcess();
        const stop = vi.fn();

        await runApp(() => ({ run: () => undefined, stop }), {
            source: { name: "Demo" },
            logger,
            output,
            config,
            environment: fakeEnvironment(),
            shutdownHooks: true,
            shutdownTarget: target,
        });
        target.emit("SIGTERM");

        await vi.waitFor(() => expect(target.exit).toHaveBeenCalledWith(0));
        expect(stop).toHaveBeenCalledTimes(1);
        expect(events).toEqual([STARTING, "info: Started Demo in 0 seconds", "info: Stopping Demo (received SIGTERM)"]);
    });

    it("can remove the shutdown hooks it installed", async () => {
        const { logger, output } = recorder();
        const target = new FakeProcess();

        const started = await runApp(() => ({ run: () => undefined }), {
            source: { name: "Demo" },
            logger,
            output,
            config,
            environment: fakeEnvironment(),
            shutdownHooks: true,
            shutdownTarget: target,
        });
        expect(target.listenerCount("SIGINT")).toBe(1);

        started.removeShutdownHooks();

        expect(target.listenerCount("SIGINT")).toBe(0);
        expect(target.listenerCount("SIGTERM")).toBe(0);
    });

    it("installs no shutdown hooks unless asked", async () => {
        const { logger, output } = recorder();
        const target = new FakeProcess();

        const started = await runApp(() => ({ run: () => undefined }), {
            logger,
            output,
            config,
            environment: fakeEnvironment(),
            shutdownTarget: target,
        });

        expect(target.listenerCount("SIGTERM")).toBe(0);
        expect(() => started.removeShutdownHooks()).not.toThrow();
    });
});

describe("currentPid", () => {
    it("is the process id", () => {
        expect(currentPid()).toBe(String(process.pid));
    });
});
