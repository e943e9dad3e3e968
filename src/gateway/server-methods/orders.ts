import { Type } from "@sinclair/typebox";
import { getOrderDesk, type OrderDesk } from "../../orders/index.js";
import { OrderStatusSchema } from "../../orders/order-types.js";
import { internalError, parseParams, type GatewayRequestHandlers } from "./types.js";

const RightSchema = Type.Union([Type.Literal("call"), Type.Literal("put")]);
const SideSchema = Type.Union([Type.Literal("buy"), Type.Literal("sell")]);
const TifSchema = Type.Union([Type.Literal("day"), Type.Literal("gtc")]);

const PlaceParams = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.String(),
  right: RightSchema,
  strike: Type.Number({ minimum: 0 }),
  side: SideSchema,
  quantity: Type.Integer({ minimum: 1 }),
  limit: Type.Number({ exclusiveMinimum: 0 }),
  tif: Type.Optional(TifSchema),
  note: Type.Optional(Type.String()),
});

const SpreadParams = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.String(),
  lowerStrike: Type.Number({ minimum: 0 }),
  lowerLimit: Type.Number({ exclusiveMinimum: 0 }),
  upperStrike: Type.Number({ minimum: 0 }),
  upperLimit: Type.Number({ exclusiveMinimum: 0 }),
  quantity: Type.Integer({ minimum: 1 }),
});

const IdParams = Type.Object({ id: Type.String({ minLength: 1 }) });

const CloseParams = Type.Object({
  id: Type.String({ minLength: 1 }),
  limit: Type.Number({ exclusiveMinimum: 0 }),
  tif: Type.Optional(TifSchema),
});

const ListParams = Type.Object({
  status: Type.Optional(OrderStatusSchema),
  expiringWithinDays: Type.Optional(Type.Number({ minimum: 0 })),
});

const AnalyzeParams = Type.Object({
  id: Type.String({ minLength: 1 }),
  upPct: Type.Optional(Type.Number({ minimum: 0 })),
  downPct: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

export function createOrdersHandlers(
  getDesk: () => OrderDesk = getOrderDesk,
): GatewayRequestHandlers {
  return {
    "orders.place": async ({ params, respond, context }) => {
      const request = parseParams(PlaceParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const result = await getDesk().placeOrder(request);
        if (result.order) {
          context.broadcast("orders.updated", {
            action: "place",
            orderId: result.order.id,
            status: result.order.status,
          });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.placeSpread": async ({ params, respond, context }) => {
      const request = parseParams(SpreadParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const result = await getDesk().placeBullCallSpread(request);
        if (result.orders.length > 0) {
          context.broadcast("orders.updated", {
            action: "placeSpread",
            orderIds: result.orders.map((o) => o.id),
          });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.cancel": async ({ params, respond, context }) => {
      const request = parseParams(IdParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const desk = getDesk();
        if (!(await desk.getOrder(request.id))) {
          respond(false, undefined, { code: "NOT_FOUND", message: `Order ${request.id} not found` });
          return;
        }
        const result = await desk.cancelOrder(request.id);
        if (result.success) {
          context.broadcast("orders.updated", { action: "cancel", orderId: request.id });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.close": async ({ params, respond, context }) => {
      const request = parseParams(CloseParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const desk = getDesk();
        if (!(await desk.getOrder(request.id))) {
          respond(false, undefined, { code: "NOT_FOUND", message: `Order ${request.id} not found` });
          return;
        }
        const result = await desk.closeOrder(request.id, request.limit, request.tif);
        if (result.order) {
          context.broadcast("orders.updated", {
            action: "close",
            orderId: result.order.id,
            closes: request.id,
          });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.delete": async ({ params, respond, context }) => {
      const request = parseParams(IdParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const result = await getDesk().deleteOrder(request.id);
        if (!result.success) {
          respond(false, undefined, { code: "NOT_FOUND", message: result.message });
          return;
        }
        context.broadcast("orders.updated", { action: "delete", orderId: request.id });
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.list": async ({ params, respond }) => {
      const filter = parseParams(ListParams, params, respond);
      if (!filter) {
        return;
      }
      try {
        const orders = await getDesk().listOrders(filter);
        respond(true, { orders });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.get": async ({ params, respond }) => {
      const request = parseParams(IdParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const order = await getDesk().getOrder(request.id);
        if (!order) {
          respond(false, undefined, { code: "NOT_FOUND", message: `Order ${request.id} not found` });
          return;
        }
        respond(true, order);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.analyze": async ({ params, respond }) => {
      const request = parseParams(AnalyzeParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const analysis = await getDesk().analyzeOrder(request.id, request);
        if (!analysis) {
          respond(false, undefined, {
            code: "NOT_FOUND",
            message: `No order ${request.id} with a known premium`,
          });
          return;
        }
        respond(true, analysis);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "orders.status": async ({ respond }) => {
      try {
        respond(true, await getDesk().monitoringStatus());
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },
  };
}

export const ordersHandlers: GatewayRequestHandlers = createOrdersHandlers();
