export { ConnectRetryPolicy } from "./ConnectRetryPolicy";
