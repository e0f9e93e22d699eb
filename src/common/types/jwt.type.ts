/**
 * JWT Token Types
 */
export enum TokenType {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/**
 * JWT Payload Interface
 * `sub` carries the numeric user id as a string, per RFC 7519.
 */
export interface JwtPayload {
  sub: string;
  type: TokenType;
  email: string;
  username: string;
  isStaff: boolean;
  exp?: number;
  iat?: number;
}

/**
 * The shape attached to `request.user` by JwtStrategy.
 */
export interface AuthUser {
  id: number;
  email: string;
  username: string;
  isStaff: boolean;
}
