import { fabricNameSchema, queryFilterSchema } from '../schemas/endpoints.js';
import type { QueryFilter } from '../types/endpoints.js';
import type { RequestDescriptor } from '../types/request.js';
import { createDescriptor, validateInput, withQuery } from './descriptor.js';
import { FABRICS } from './paths.js';

/**
 * List fabrics. The path always carries `category=fabric`; filter, paging and
 * sort parameters are added when set.
 *
 * @example
 * fabricsGet({ filter: 'name:my_fabric', max: 10 }).path
 * // '/api/v1/manage/fabrics?category=fabric&filter=name%3Amy_fabric&max=10'
 */
export function fabricsGet(query: QueryFilter = {}): RequestDescriptor {
  const description = 'Get Fabric Details';
  const { filter, limit, max, offset, sort } = validateInput(
    query,
    queryFilterSchema,
    description,
  );
  return createDescriptor(
    'GET',
    withQuery(FABRICS, { category: 'fabric', filter, limit, max, offset, sort }),
    description,
  );
}

export function fabricGet(fabricName: string): RequestDescriptor {
  const description = 'Get Fabric';
  const name = validateInput(fabricName, fabricNameSchema, description);
  return createDescriptor('GET', `${FABRICS}/${encodeURIComponent(name)}`, description);
}
