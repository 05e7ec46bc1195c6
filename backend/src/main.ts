import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError } from "@dayahead/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { setRuntimeConfig } from "./config/runtime-config";
import type { ConfigDocument } from "./config/schemas";
import { PriceCoordinatorService } from "./nordpool/price-coordinator.service";
import type { AppRouter } from "./trpc/trpc.router";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  validateConfigDocument(initialConfig);
  setRuntimeConfig(initialConfig);
  const adapter = new FastifyAdapter({logger: false, maxParamLength: 4096});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify = app.getHttpAdapter().getInstance() as unknown as FastifyInstance;
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({now: new Date()}),
    },
  } satisfies FastifyTRPCPluginOptions<AppRouter>);

  if (process.env.NODE_ENV !== "test") {
    await app.get(PriceCoordinatorService).firstRefresh();
  }

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    const logger = new Logger("dayahead");
    const address = fastify.server.address();
    let baseUrl = `http://localhost:${port}`;
    if (isAddressInfo(address)) {
      const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
      baseUrl = `http://${resolvedHost}:${address.port}`;
    } else if (typeof address === "string" && address.length > 0) {
      baseUrl = address;
    }

    logger.log(`API ready at ${baseUrl}`);

    const trpcProcedures = trpcRouter.listProcedures();
    if (trpcProcedures.length) {
      const formatted = trpcProcedures
        .map(({path, type}, index) => {
          const prefix = index === trpcProcedures.length - 1 ? "└──" : "├──";
          return `${prefix} ${type.toUpperCase()} /trpc/${path}`;
        })
        .join("\n");
      logger.log(`tRPC procedures:\n${formatted}`);
    }
  }

  return app;
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[] = ["fatal", "error", "warn", "log"];
  let normalizedLevel = "info";
  let document: ConfigDocument | null = null;

  try {
    const configPath = configFileService.resolvePath();
    document = await configFileService.loadDocument(configPath);

    const rawLevel = document.logging?.level ?? "info";
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${String(rawLevel)}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration for logging: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

function validateConfigDocument(document: ConfigDocument): void {
  const bootstrapLogger = new Logger("bootstrap");

  for (const area of Object.keys(document.consumer_settings ?? {})) {
    if (!document.delivery_areas.includes(area)) {
      bootstrapLogger.warn(`consumer_settings.${area} is ignored; ${area} is not listed in delivery_areas.`);
    }
  }

  const timeout = document.api?.timeout_ms;
  if (timeout !== undefined && timeout < 1000) {
    throw new Error("api.timeout_ms must be at least 1000.");
  }

  bootstrapLogger.verbose("Configuration validation successful.");
}

function resolveLogLevels(level: unknown): { levels: LogLevel[]; normalized: string; fallbackUsed: boolean } {
  const normalizedInput = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const aliasMap: Record<string, string> = {
    log: "info",
    info: "info",
    warning: "warn",
  };
  const canonical = aliasMap[normalizedInput] ?? normalizedInput;

  switch (canonical) {
    case "fatal":
      return {levels: ["fatal"], normalized: "fatal", fallbackUsed: false};
    case "error":
      return {levels: ["fatal", "error"], normalized: "error", fallbackUsed: false};
    case "warn":
      return {levels: ["fatal", "error", "warn"], normalized: "warn", fallbackUsed: false};
    case "info":
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: false};
    case "debug":
      return {levels: ["fatal", "error", "warn", "log", "debug"], normalized: "debug", fallbackUsed: false};
    case "verbose":
      return {levels: ["fatal", "error", "warn", "log", "debug", "verbose"], normalized: "verbose", fallbackUsed: false};
    default:
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: true};
  }
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error: unknown) => {
    new Logger("bootstrap").fatal(`Start-up failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}

export { bootstrap };
