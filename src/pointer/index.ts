export * from './ast';
export * from './naming.util';
export { json_name, get_json_name } from './schema.util';
export * from './builder';
export * from './capture';
export * from './pointer';
