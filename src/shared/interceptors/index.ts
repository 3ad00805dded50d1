export * from './request-id.interceptor'
