import type { Request } from 'express';
import type { IdentityClaims } from '../token/identity-claims';
import type { StoredFileRecord } from '../upload/stored-file-record';

/**
 * What the gatekeeper learned about a request, handed to controllers once
 * every stage of the route has passed.
 */
export interface GatekeeperContext {
  requestId?: string;
  clientKey: string;
  claims?: IdentityClaims;
  files?: readonly StoredFileRecord[];
}

export interface GatekeptRequest extends Request {
  requestId?: string;
  gatekeeper?: GatekeeperContext;
}
