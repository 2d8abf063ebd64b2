export * from './ApiError';
export { errorHandler, notFoundHandler, asyncHandler } from './errorHandler';
