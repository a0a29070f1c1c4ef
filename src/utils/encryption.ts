import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { config } from '../config';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

export interface EncryptedData {
  encryptedContent: string;
  iv: string;
  authTag: string;
}

/**
 * Encryption service interface - async so a KMS-backed implementation can slot in
 */
export interface IEncryptionService {
  encrypt(content: string): Promise<EncryptedData>;
  decrypt(data: EncryptedData): Promise<string>;
}

/**
 * AES-256-GCM with a key from the environment. All fields are hex encoded.
 */
export class LocalEncryptionService implements IEncryptionService {
  private readonly key: Buffer;

  constructor(hexKey: string) {
    this.key = Buffer.from(hexKey, 'hex');
    if (this.key.length !== 32) {
      throw new Error('Encryption key must be 32 bytes');
    }
  }

  async encrypt(content: string): Promise<EncryptedData> {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(content, 'utf8'), cipher.final()]);

    return {
      encryptedContent: encrypted.toString('hex'),
      iv: iv.toString('hex'),
      authTag: cipher.getAuthTag().toString('hex'),
    };
  }

  async decrypt(data: EncryptedData): Promise<string> {
    const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(data.iv, 'hex'));
    decipher.setAuthTag(Buffer.from(data.authTag, 'hex'));
    const decrypted = Buffer.concat([
      decipher.update(Buffer.from(data.encryptedContent, 'hex')),
      decipher.final(),
    ]);
    return decrypted.toString('utf8');
  }
}

// Singleton instance - lazily initialized
let encryptionService: IEncryptionService | null = null;

export function getEncryptionService(): IEncryptionService {
  if (!encryptionService) {
    encryptionService = new LocalEncryptionService(config.encryption.key);
  }
  return encryptionService;
}
