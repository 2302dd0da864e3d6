export type Destination = "log" | "microblog";

export type DeliveryResult =
  | { status: "delivered"; ref: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string; error: unknown };

export interface RouteOutcome {
  messageId: string;
  sourceChannel: number;
  processedText: string;
  log: DeliveryResult;
  microblog: DeliveryResult;
}
