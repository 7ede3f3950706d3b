import { createDecipheriv } from 'crypto';
import { Decryptor } from '../models/provider.model';

// Every audio file is encrypted with AES-128-CTR starting from this counter
export const AUDIO_AES_IV = Buffer.from('72e067fbddcbcf77ebe8bc643f630d93', 'hex');

const KEY_LENGTH = 16;

export class AudioDecryptor implements Decryptor {
  public decrypt(key: Buffer, encrypted: Buffer): Buffer {
    if (key.length !== KEY_LENGTH) {
      throw new Error(`Audio key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }

    const decipher = createDecipheriv('aes-128-ctr', key, AUDIO_AES_IV);
    return Buffer.concat([decipher.update(encrypted), decipher.final()]);
  }
}
