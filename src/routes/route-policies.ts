import { RequestMethod } from '@nestjs/common';
import { ADMIN_ROLES } from '../common/constants/roles.constant';
import type { GatekeeperOptions } from '../gatekeeper/interfaces/gatekeeper-options.interface';
import type { RoutePolicy } from '../gatekeeper/pipeline/route-policy.interface';
import { RateClass } from '../gatekeeper/rate-limit/rate-classes';
import {
  defaultUploadConstraints,
  documentUploadConstraints,
  imageUploadConstraints,
  multipleImageUploadConstraints,
} from '../gatekeeper/upload/upload-constraints';

export const API_PREFIX = 'api/v1';
export const MAX_IMAGES_PER_REQUEST = 5;

export interface RouteBinding {
  method: RequestMethod;
  /** Relative to API_PREFIX */
  path: string;
  policy: RoutePolicy;
}

/**
 * Every gated route with its chain. Paths must match a controller route
 * exactly; each binding is mounted for its own method only.
 */
export function buildRouteBindings(options: GatekeeperOptions): RouteBinding[] {
  const root = options.uploadRoot;

  return [
    {
      method: RequestMethod.GET,
      path: 'health',
      policy: { id: 'health', rateLimit: { limit: RateClass.LENIENT } },
    },
    {
      method: RequestMethod.GET,
      path: 'users/profile',
      policy: {
        id: 'users.profile',
        rateLimit: { limit: RateClass.MODERATE },
        authenticate: true,
      },
    },
    {
      method: RequestMethod.POST,
      path: 'files/upload',
      policy: {
        id: 'files.upload',
        rateLimit: { limit: RateClass.MODERATE },
        authenticate: true,
        upload: defaultUploadConstraints(root),
      },
    },
    {
      method: RequestMethod.POST,
      path: 'files/upload/image',
      policy: {
        id: 'files.upload.image',
        rateLimit: { limit: RateClass.STRICT },
        authenticate: true,
        upload: imageUploadConstraints(root),
      },
    },
    {
      method: RequestMethod.POST,
      path: 'files/upload/document',
      policy: {
        id: 'files.upload.document',
        rateLimit: { limit: RateClass.MODERATE },
        authenticate: true,
        upload: documentUploadConstraints(root),
      },
    },
    {
      method: RequestMethod.POST,
      path: 'files/upload/images',
      policy: {
        id: 'files.upload.images',
        rateLimit: { limit: RateClass.STRICT },
        authenticate: true,
        upload: multipleImageUploadConstraints(root, MAX_IMAGES_PER_REQUEST),
      },
    },
    {
      method: RequestMethod.GET,
      path: 'admin/rate-limits',
      policy: {
        id: 'admin.rate-limits',
        rateLimit: { limit: RateClass.MODERATE, scope: 'admin' },
        roles: ADMIN_ROLES,
      },
    },
    {
      method: RequestMethod.POST,
      path: 'admin/rate-limits/reset',
      policy: {
        id: 'admin.rate-limits.reset',
        rateLimit: { limit: RateClass.MODERATE, scope: 'admin' },
        roles: ADMIN_ROLES,
      },
    },
  ];
}
