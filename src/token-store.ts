import * as fs from 'fs';
import * as path from 'path';
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import { Credential } from './types';
import { CredentialSchema, EncryptedCredentialSchema } from './api-schemas';
import logger from './logger';

export interface TokenStore {
  load(): Credential | null;
  save(credential: Credential): void;
}

const CIPHER = 'aes-256-gcm';

/**
 * Keeps the credential in a single JSON file, AES-256-GCM encrypted when a
 * passphrase is given. Anything unreadable loads as null so the caller falls
 * back to a fresh authorization.
 */
export class FileTokenStore implements TokenStore {
  private key?: Buffer;

  constructor(private filePath: string, encryptionKey?: string) {
    if (encryptionKey) {
      this.key = createHash('sha256').update(encryptionKey).digest();
    }
  }

  load(): Credential | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      const contents = fs.readFileSync(this.filePath, 'utf-8');
      if (!contents.trim()) {
        return null;
      }
      raw = JSON.parse(contents);
    } catch (error) {
      logger.warn('Ignoring unreadable token file', {
        path: this.filePath,
        error: error instanceof Error ? error.message : error
      });
      return null;
    }

    const envelope = EncryptedCredentialSchema.safeParse(raw);
    if (envelope.success) {
      raw = this.decrypt(envelope.data);
      if (raw === null) {
        return null;
      }
    }

    const credential = CredentialSchema.safeParse(raw);
    if (!credential.success) {
      logger.warn('Ignoring malformed token file', {
        path: this.filePath,
        issues: credential.error.issues.map(issue => issue.path.join('.') || issue.message)
      });
      return null;
    }

    return credential.data;
  }

  save(credential: Credential): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const payload = this.key ? this.encrypt(credential) : credential;
    fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), { encoding: 'utf-8', mode: 0o600 });
    // writeFileSync only applies mode when it creates the file
    fs.chmodSync(this.filePath, 0o600);

    logger.debug('Saved credential', { path: this.filePath, encrypted: !!this.key });
  }

  clear(): boolean {
    if (!fs.existsSync(this.filePath)) {
      return false;
    }
    fs.unlinkSync(this.filePath);
    return true;
  }

  private encrypt(credential: Credential): { version: 1; iv: string; tag: string; data: string } {
    if (!this.key) {
      throw new Error('Token encryption requested without a key');
    }

    const iv = randomBytes(12);
    const cipher = createCipheriv(CIPHER, this.key, iv);
    const data = Buffer.concat([cipher.update(JSON.stringify(credential), 'utf-8'), cipher.final()]);

    return {
      version: 1,
      iv: iv.toString('base64'),
      tag: cipher.getAuthTag().toString('base64'),
      data: data.toString('base64')
    };
  }

  private decrypt(envelope: { iv: string; tag: string; data: string }): unknown {
    if (!this.key) {
      logger.warn('Token file is encrypted but TOKENS_ENCRYPTION_KEY is not set', { path: this.filePath });
      return null;
    }

    try {
      const decipher = createDecipheriv(CIPHER, this.key, Buffer.from(envelope.iv, 'base64'));
      decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'));
      const plain = Buffer.concat([
        decipher.update(Buffer.from(envelope.data, 'base64')),
        decipher.final()
      ]);
      return JSON.parse(plain.toString('utf-8'));
    } catch (error) {
      logger.warn('Could not decrypt token file', {
        path: this.filePath,
        error: error instanceof Error ? error.message : error
      });
      return null;
    }
  }
}
