import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { Viewer } from './viewer';

export type ViewerRequest = Request & { viewer?: Viewer | null };

/**
 * The viewer attached by AuthGuard / OptionalAuthGuard, or null for anonymous requests.
 * Services take it as an explicit argument; nothing reads it from ambient state.
 */
export const CurrentViewer = createParamDecorator((_data: unknown, ctx: ExecutionContext): Viewer | null => {
  const req = ctx.switchToHttp().getRequest<ViewerRequest>();
  return req.viewer ?? null;
});
