import { Type } from "@sinclair/typebox";
import { getStrategyStore, StrategyKindSchema, type StrategyStore } from "../../strategies/index.js";
import { internalError, parseParams, type GatewayRequestHandlers } from "./types.js";

const SaveParams = Type.Object({
  kind: StrategyKindSchema,
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.Optional(Type.String()),
  legs: Type.Array(
    Type.Object({
      type: Type.Union([Type.Literal("call"), Type.Literal("put")]),
      side: Type.Union([Type.Literal("long"), Type.Literal("short")]),
      strike: Type.Number({ minimum: 0 }),
      premium: Type.Number({ minimum: 0 }),
      contracts: Type.Optional(Type.Integer({ minimum: 1 })),
      multiplier: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    }),
    { minItems: 1 },
  ),
  marketPriceAtSave: Type.Optional(Type.Number({ minimum: 0 })),
  note: Type.Optional(Type.String()),
});

const IdParams = Type.Object({ id: Type.String({ minLength: 1 }) });

export function createStrategiesHandlers(
  getStore: () => Promise<StrategyStore> = getStrategyStore,
): GatewayRequestHandlers {
  return {
    "strategies.list": async ({ respond }) => {
      try {
        const store = await getStore();
        respond(true, { strategies: store.list() });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "strategies.save": async ({ params, respond, context }) => {
      const request = parseParams(SaveParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const store = await getStore();
        const strategy = await store.save(request);
        context.broadcast("strategies.updated", { action: "save", id: strategy.id });
        respond(true, strategy);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "strategies.delete": async ({ params, respond, context }) => {
      const request = parseParams(IdParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const store = await getStore();
        if (!(await store.remove(request.id))) {
          respond(false, undefined, {
            code: "NOT_FOUND",
            message: `Strategy ${request.id} not found`,
          });
          return;
        }
        context.broadcast("strategies.updated", { action: "delete", id: request.id });
        respond(true, { success: true });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },
  };
}

export const strategiesHandlers: GatewayRequestHandlers = createStrategiesHandlers();
