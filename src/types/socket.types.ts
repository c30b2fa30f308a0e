import { WsException } from '@nestjs/websockets';
import { isRecord, readString } from '../utils/guards';

export type ConnectionRole = 'teacher' | 'student' | 'viewer';

export const CONNECTION_ROLES: readonly ConnectionRole[] = ['teacher', 'student', 'viewer'];

export interface AuthenticatedUser {
  userId: string;
  userName: string;
  role: ConnectionRole;
}

export function parseConnectionRole(value: unknown): ConnectionRole | null {
  return CONNECTION_ROLES.find((role) => role === value) ?? null;
}

export function isAuthenticatedUser(value: unknown): value is AuthenticatedUser {
  return (
    isRecord(value) &&
    typeof value.userId === 'string' &&
    typeof value.userName === 'string' &&
    parseConnectionRole(value.role) !== null
  );
}

// passport stores the validated user on the request object it was given (the socket for ws)
export function getRequestUser(request: unknown): AuthenticatedUser | null {
  if (!isRecord(request)) return null;
  const user = request.user;
  return isAuthenticatedUser(user) ? user : null;
}

/**
 * The part of a socket.io `Socket` the lesson gateway relies on. Passport
 * leaves the validated user on the socket as `user`.
 */
export interface LessonSocket {
  readonly id: string;
  readonly connected: boolean;
  readonly handshake: unknown;
  emit(event: string, payload: unknown): unknown;
  disconnect(close?: boolean): unknown;
}

export function getSocketUser(client: LessonSocket): AuthenticatedUser {
  const user = getRequestUser(client);
  if (!user) {
    throw new WsException('Unable to identify the connected user.');
  }
  return user;
}

/**
 * Clients pass the JWT either as `io(url, { auth: { token } })` or as a
 * `?token=` query parameter; HTTP callers use a bearer header.
 */
export function extractToken(request: unknown): string | null {
  if (!isRecord(request)) return null;

  const handshake = request.handshake;
  if (isRecord(handshake)) {
    const auth = handshake.auth;
    const fromAuth = isRecord(auth) ? readString(auth, 'token') : null;
    if (fromAuth) return fromAuth;
    const query = handshake.query;
    return isRecord(query) ? readString(query, 'token') : null;
  }

  const headers = request.headers;
  if (isRecord(headers)) {
    const authorization = readString(headers, 'authorization');
    if (authorization?.startsWith('Bearer ')) {
      return authorization.slice('Bearer '.length).trim() || null;
    }
  }
  return null;
}
