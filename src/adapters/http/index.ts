export { createHttpTransport, type HttpTransportConfig } from "./transport";
export type { Transport, TransportBody, TransportRequest, TransportResponse } from "./types";
