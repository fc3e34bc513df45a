export { fetchWithTimeout } from './http-client';
