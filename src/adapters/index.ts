/**
 * Adapters 模块导出
 */

export { createAxiosAdapter, axiosAdapter } from './axios';
export type { AxiosAdapterConfig } from './axios';

export { createFetchAdapter, fetchAdapter, buildUrl } from './fetch';
export type { FetchAdapterConfig } from './fetch';
