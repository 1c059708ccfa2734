/**
 * @file ingress-guard.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { BlockList, isIPv4, isIPv6 } from 'node:net';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import { IngressRejectedError } from '../../domain/errors/domain-errors.js';

const IPV4_MAPPED_PREFIX = '::ffff:';

const loopback = new BlockList();
loopback.addSubnet('127.0.0.0', 8, 'ipv4');
loopback.addAddress('::1', 'ipv6');

export const FORBIDDEN_BODY = 'Forbidden: Broadcasts only allowed from localhost';

/**
 * True for 127.0.0.0/8, `::1`, and the IPv4-mapped form of a 127/8 address.
 */
export function isLoopbackAddress(address: string | undefined): boolean {
  if (!address) {
    return false;
  }

  let candidate = address.trim().toLowerCase();
  if (candidate.startsWith(IPV4_MAPPED_PREFIX) && isIPv4(candidate.slice(IPV4_MAPPED_PREFIX.length))) {
    candidate = candidate.slice(IPV4_MAPPED_PREFIX.length);
  }

  if (isIPv4(candidate)) {
    return loopback.check(candidate, 'ipv4');
  }
  if (isIPv6(candidate)) {
    return loopback.check(candidate, 'ipv6');
  }
  return false;
}

/**
 * Creates an `onRequest` hook that refuses non-loopback callers before the
 * body is parsed. Uses the socket's peer address, never forwarded headers.
 */
export function createLoopbackGuard(
  logger: Logger
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  const log = logger.child({ component: 'IngressGuard' });

  return async function loopbackGuard(request, reply) {
    const address = request.socket.remoteAddress;
    if (isLoopbackAddress(address)) {
      return;
    }

    const error = new IngressRejectedError(address);
    log.warn({ remoteAddress: address, url: request.url, code: error.code }, 'Broadcast rejected');
    return reply
      .status(error.statusCode)
      .type('text/plain; charset=utf-8')
      .send(FORBIDDEN_BODY);
  };
}
