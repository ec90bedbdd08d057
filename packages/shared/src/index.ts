export type { TestRequest, TestResponse, ApiInfoResponse, HealthResponse } from './types/api.js';
