export type { IMessageTransport, TransportFactory } from "./IMessageTransport";
export type { IRetryPolicy } from "./IRetryPolicy";
