/**
 * 传输单元
 *
 * The innermost service: hands the request to the adapter and maps whatever
 * it throws into a TransportError. No retries, no per-request state.
 */

import {
  normalizeError,
  type HttpAdapter,
  type HttpRequest,
  type ResponseData,
  type Service,
} from '../engine';

export class TransportService implements Service {
  constructor(private readonly adapter: HttpAdapter) {}

  async call(request: HttpRequest): Promise<ResponseData> {
    try {
      return await this.adapter.request(request);
    } catch (error) {
      throw normalizeError(error, request);
    }
  }
}
