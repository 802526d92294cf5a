import { Request } from 'express';
import { Identity } from '../identity/identity';

/**
 * Express request after the authorization guard ran. `identity` is absent
 * on public routes.
 */
export interface AuthenticatedRequest extends Request {
  identity?: Identity;
}
