/**
 * @file wg/keys.ts
 * @description Génération des clés WireGuard (Curve25519) sans le binaire wg
 */

import nacl from 'tweetnacl';
import { InvalidArgumentError } from './errors.js';

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

/**
 * Source de clés injectable (remplacée par une version déterministe en test)
 */
export interface KeyGenerator {
  generateKeyPair(): KeyPair;
  generatePresharedKey(): string;
}

const KEY_RE = /^[A-Za-z0-9+/]{43}=$/;

/**
 * Clé base64 de 32 octets (44 caractères)
 */
export function isValidKey(key: string): boolean {
  return KEY_RE.test(key) && Buffer.from(key, 'base64').length === 32;
}

function decodeKey(key: string): Uint8Array {
  if (!isValidKey(key)) {
    throw new InvalidArgumentError(`clé WireGuard invalide "${key}"`);
  }
  return new Uint8Array(Buffer.from(key, 'base64'));
}

function encodeKey(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Dérive la clé publique d'une clé privée (équivalent de `wg pubkey`)
 */
export function publicKeyFromPrivate(privateKey: string): string {
  return encodeKey(nacl.scalarMult.base(decodeKey(privateKey)));
}

export const naclKeyGenerator: KeyGenerator = {
  generateKeyPair(): KeyPair {
    const secret = nacl.randomBytes(32);
    // Clamping Curve25519, comme `wg genkey`
    secret[0] &= 248;
    secret[31] = (secret[31] & 127) | 64;

    return {
      privateKey: encodeKey(secret),
      publicKey: encodeKey(nacl.scalarMult.base(secret)),
    };
  },

  generatePresharedKey(): string {
    return encodeKey(nacl.randomBytes(32));
  },
};
