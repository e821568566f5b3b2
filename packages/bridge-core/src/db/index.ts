export { getDocClient, getTableName } from './client';
export { META_SK, PREFIX } from './constants';
export { servicePK, serviceKeys } from './keys';
