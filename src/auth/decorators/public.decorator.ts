import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'authz:isPublic';

/** Opt a route out of authentication. Public routes are rate limited per address. */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
