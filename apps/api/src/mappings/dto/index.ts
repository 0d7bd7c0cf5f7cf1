export * from './create-mapping.dto';
export * from './mapping-query.dto';
