export { ApiError, statusErrorHandler, type ApiErrorBody } from "./error-handler.js";
