import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import { deliveryAreaLabel, ServiceValidationError, UpdateFailedError } from "@dayahead/domain";
import { PriceAnalysisService } from "../analysis/price-analysis.service";
import {
  bestNextWindowInputSchema,
  cheapestBlocksInputSchema,
  exportStrategyInputSchema,
  forecastDeviceCostInputSchema,
  priceAlertsInputSchema,
} from "../analysis/inputs";
import { DiagnosticsService } from "../diagnostics/diagnostics.service";
import { PriceCoordinatorService } from "../nordpool/price-coordinator.service";
import { SensorStateService } from "../sensors/sensor-state.service";

export interface TrpcContext {
  /** Clock for time-dependent queries. */
  now: Date;
}

export interface AppRouterDeps {
  coordinator: PriceCoordinatorService;
  sensors: SensorStateService;
  analysis: PriceAnalysisService;
  diagnostics: DiagnosticsService;
}

export type ProcedureKind = "query" | "mutation" | "subscription";

const t = initTRPC.context<TrpcContext>().create();

const mapDomainErrors = t.middleware(async ({next}) => {
  const result = await next();
  if (!result.ok) {
    const cause = result.error.cause;
    if (cause instanceof ServiceValidationError) {
      throw new TRPCError({code: "BAD_REQUEST", message: cause.message, cause});
    }
    if (cause instanceof UpdateFailedError) {
      throw new TRPCError({code: "PRECONDITION_FAILED", message: cause.message, cause});
    }
  }
  return result;
});

const procedure = t.procedure.use(mapDomainErrors);

const areaInput = z.string().trim().min(1).toUpperCase();

export function createAppRouter({coordinator, sensors, analysis, diagnostics}: AppRouterDeps) {
  return t.router({
    prices: t.router({
      areas: procedure.query(() =>
        coordinator.deliveryAreas.map((area) => ({area, label: deliveryAreaLabel(area)})),
      ),
      day: procedure
        .input(
          z.object({
            area: areaInput,
            day: z.enum(["today", "tomorrow"]).default("today"),
            resolution: z.enum(["quarter", "hour"]).default("quarter"),
          }),
        )
        .query(({input}) => analysis.getDayPrices(input.area, input.day, input.resolution)),
      refresh: procedure.mutation(({ctx}) => coordinator.refresh(ctx.now)),
    }),
    sensors: t.router({
      list: procedure
        .input(z.object({area: areaInput.optional()}).optional())
        .query(({input, ctx}) => sensors.listStates(ctx.now, input?.area)),
      get: procedure
        .input(z.object({uniqueId: z.string().min(1)}))
        .query(({input, ctx}) => {
          const state = sensors.getState(input.uniqueId, ctx.now);
          if (!state) {
            throw new TRPCError({code: "NOT_FOUND", message: `Unknown sensor '${input.uniqueId}'.`});
          }
          return state;
        }),
    }),
    services: t.router({
      cheapestBlocks: procedure
        .input(cheapestBlocksInputSchema)
        .query(({input}) => analysis.getCheapestBlocks(input)),
      forecastDeviceCost: procedure
        .input(forecastDeviceCostInputSchema)
        .query(({input}) => analysis.forecastDeviceCost(input)),
      bestNextWindow: procedure
        .input(bestNextWindowInputSchema)
        .query(({input, ctx}) => analysis.getBestNextWindow(input, ctx.now)),
      exportStrategy: procedure
        .input(exportStrategyInputSchema)
        .query(({input}) => analysis.getExportStrategy(input)),
      priceAlerts: procedure
        .input(priceAlertsInputSchema)
        .query(({input}) => analysis.getPriceAlerts(input)),
    }),
    diagnostics: t.router({
      get: procedure.query(({ctx}) => diagnostics.getDiagnostics(ctx.now)),
    }),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

function procedureKind(value: unknown): ProcedureKind | null {
  if ((typeof value !== "function" && typeof value !== "object") || value === null || !("_def" in value)) {
    return null;
  }
  const def = value._def;
  if (typeof def !== "object" || def === null) {
    return null;
  }
  if ("mutation" in def && def.mutation === true) {
    return "mutation";
  }
  if ("subscription" in def && def.subscription === true) {
    return "subscription";
  }
  if ("query" in def && def.query === true) {
    return "query";
  }
  return null;
}

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter;

  constructor(
    @Inject(PriceCoordinatorService) coordinator: PriceCoordinatorService,
    @Inject(SensorStateService) sensors: SensorStateService,
    @Inject(PriceAnalysisService) analysis: PriceAnalysisService,
    @Inject(DiagnosticsService) diagnostics: DiagnosticsService,
  ) {
    this.router = createAppRouter({coordinator, sensors, analysis, diagnostics});
  }

  listProcedures(): { path: string; type: ProcedureKind }[] {
    const procedures: Record<string, unknown> = this.router._def.procedures;
    return Object.entries(procedures)
      .flatMap(([path, value]) => {
        const type = procedureKind(value);
        return type ? [{path, type}] : [];
      })
      .sort((a, b) => a.path.localeCompare(b.path));
  }
}
