export { HttpEngine } from './http';
