import type { RateLimitChoice } from '../rate-limit/rate-classes';
import type { UploadConstraintSet } from '../upload/upload-constraints';

export interface RoutePolicy {
  /** Used in logs and as the default rate-limit scope */
  id: string;
  rateLimit?: {
    limit: RateLimitChoice;
    /** Routes naming the same scope share one set of buckets */
    scope?: string;
  };
  authenticate?: boolean;
  /** Implies `authenticate` */
  roles?: readonly string[];
  upload?: UploadConstraintSet;
  timeoutMs?: number;
}
