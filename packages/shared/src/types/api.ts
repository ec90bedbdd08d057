// HTTP request/response DTOs

export interface TestRequest {
  /** Contract creation bytecode, hex, with or without a 0x prefix. */
  deploycode: string;
  /** Names the generated file (C<id>_test.t.sol) and test contract (Test<id>). */
  test_id: string;
  function_name?: string;
  /** Template to fill in; the server's default test case when omitted. */
  test_case?: string;
  /** Keep the generated test file after the run. */
  debug?: boolean;
}

export interface TestResponse {
  success: boolean;
  message: string;
  output: string;
  error?: string;
}

export interface ApiInfoResponse {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
}
