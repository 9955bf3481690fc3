export const OK = 200;
export const BAD_REQUEST = 400;
export const NOT_FOUND = 404;
export const NOT_ACCEPTABLE = 406;
export const CONFLICT = 409;
export const UNPROCESSABLE_ENTITY = 422;
export const BAD_GATEWAY = 502;
export const SERVICE_UNAVAILABLE = 503;

export type MessageResponse = {
  message: string;
  code: number;
};

export const DATA_VALIDATION: MessageResponse = {
  message: "DATA_VALIDATION",
  code: 10040,
};
export const EMPTY_BODY: MessageResponse = {
  message: "EMPTY_BODY",
  code: 10050,
};
export const ROUTING_ENGINE_FAILED: MessageResponse = {
  message: "ROUTING_ENGINE_FAILED",
  code: 20010,
};
export const ROUTING_ENGINE_UNAVAILABLE: MessageResponse = {
  message: "ROUTING_ENGINE_UNAVAILABLE",
  code: 20020,
};
export const UNKNOWN_ROUTE: MessageResponse = {
  message: "UNKNOWN_ROUTE",
  code: 20030,
};
export const ROUTE_SUPERSEDED: MessageResponse = {
  message: "ROUTE_SUPERSEDED",
  code: 20040,
};
export const INVALID_FIX: MessageResponse = {
  message: "INVALID_FIX",
  code: 30010,
};
