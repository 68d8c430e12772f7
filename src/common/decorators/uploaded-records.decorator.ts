import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { GatekeptRequest } from '../../gatekeeper/interfaces/gatekept-request.interface';
import type { StoredFileRecord } from '../../gatekeeper/upload/stored-file-record';

/** Files persisted by the route's upload stage, in upload order */
export const UploadedRecords = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): readonly StoredFileRecord[] => {
    const request = ctx.switchToHttp().getRequest<GatekeptRequest>();
    return request.gatekeeper?.files ?? [];
  },
);
