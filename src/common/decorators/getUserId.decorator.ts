import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import jwt_decode from 'jwt-decode';

interface TokenClaims {
  sub?: string;
}

/**
 * Reads the caller id from the `sub` claim of the Bearer token. The token is
 * decoded only; signature checks happen at the gateway in front of the service.
 */
export function extractUserId(authHeader: string | undefined): string {
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new UnauthorizedException('Invalid or missing token');
  }

  let claims: TokenClaims;
  try {
    claims = jwt_decode<TokenClaims>(authHeader.split(' ')[1]);
  } catch {
    throw new UnauthorizedException('Invalid token');
  }

  if (!claims.sub) {
    throw new UnauthorizedException('Token has no subject');
  }
  return claims.sub;
}

export const GetUserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return extractUserId(request.headers.authorization);
  },
);
