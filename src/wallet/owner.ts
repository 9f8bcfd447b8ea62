/**
 * Service owner credential loading.
 *
 * The key file holds either a bare hex private key or an encrypted JSON
 * keystore (V3). A password is required for the keystore form.
 */

import { promises as fs } from 'fs';
import { Wallet, isKeystoreJson, type BaseWallet, type Provider } from 'ethers';
import { CredentialError } from '../staking/errors.js';

export interface OwnerCredential {
  privateKeyPath: string;
  password?: string;
}

const PRIVATE_KEY_PATTERN = /^(0x)?[0-9a-fA-F]{64}$/;

export async function loadOwnerWallet(credential: OwnerCredential, provider: Provider | null = null): Promise<BaseWallet> {
  const { privateKeyPath, password } = credential;

  let contents: string;
  try {
    contents = (await fs.readFile(privateKeyPath, 'utf8')).trim();
  } catch (error) {
    throw new CredentialError(`Cannot read owner key file ${privateKeyPath}`, privateKeyPath, { cause: error });
  }

  if (isKeystoreJson(contents)) {
    if (password === undefined) {
      throw new CredentialError(`Owner key file ${privateKeyPath} is encrypted; pass --password`, privateKeyPath);
    }
    try {
      const wallet = await Wallet.fromEncryptedJson(contents, password);
      return wallet.connect(provider);
    } catch (error) {
      throw new CredentialError(`Failed to decrypt owner key file ${privateKeyPath}`, privateKeyPath, { cause: error });
    }
  }

  if (!PRIVATE_KEY_PATTERN.test(contents)) {
    throw new CredentialError(`Owner key file ${privateKeyPath} is neither a hex private key nor a keystore`, privateKeyPath);
  }

  const privateKey = contents.startsWith('0x') ? contents : `0x${contents}`;
  return new Wallet(privateKey, provider);
}
