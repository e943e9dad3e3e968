import { Type, type Static } from "@sinclair/typebox";

export const OrderStatusSchema = Type.Union([
  Type.Literal("working"),
  Type.Literal("filled"),
  Type.Literal("canceled"),
  Type.Literal("failed"),
]);

export const SavedOrderSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  placedAt: Type.String(), // ISO 8601
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.Optional(Type.String()), // YYYY-MM-DD
  right: Type.Union([Type.Literal("call"), Type.Literal("put")]),
  strike: Type.Number({ minimum: 0 }),
  side: Type.Union([Type.Literal("buy"), Type.Literal("sell")]),
  quantity: Type.Integer({ minimum: 1 }),
  limit: Type.Optional(Type.Number()),
  tif: Type.Union([Type.Literal("day"), Type.Literal("gtc")]),
  status: OrderStatusSchema,
  fillPrice: Type.Optional(Type.Number()),
  fillQuantity: Type.Optional(Type.Integer({ minimum: 1 })),
  note: Type.Optional(Type.String()),
});

export type OrderStatus = Static<typeof OrderStatusSchema>;
export type SavedOrder = Static<typeof SavedOrderSchema>;
export type OrderRight = SavedOrder["right"];
export type OrderSide = SavedOrder["side"];
export type TimeInForce = SavedOrder["tif"];

export class OrderInvariantError extends Error {
  readonly orderId: string;

  constructor(orderId: string, message: string) {
    super(`Order ${orderId}: ${message}`);
    this.name = "OrderInvariantError";
    this.orderId = orderId;
  }
}

/** fillPrice and fillQuantity are present exactly when the order is filled. */
export function checkOrderInvariants(order: SavedOrder): string | undefined {
  const hasFill = order.fillPrice !== undefined || order.fillQuantity !== undefined;
  if (order.status === "filled") {
    if (order.fillPrice === undefined || order.fillQuantity === undefined) {
      return "filled orders need fillPrice and fillQuantity";
    }
    return undefined;
  }
  if (hasFill) {
    return `fill fields set on a ${order.status} order`;
  }
  return undefined;
}

export function assertOrderInvariants(order: SavedOrder): void {
  const problem = checkOrderInvariants(order);
  if (problem) {
    throw new OrderInvariantError(order.id, problem);
  }
}
