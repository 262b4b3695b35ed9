import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FetchError } from '../../../common/errors';
import { InMemoryBlobStore } from '../../../testing/in-memory-blob-store';
import { testJobConfig } from '../../../testing/job-config';
import { CredentialProvisionerService } from './credential-provisioner.service';

const WALLET_PEM = '-----BEGIN CERTIFICATE-----\nTEST\n-----END CERTIFICATE-----\n';
const TNSNAMES = 'usagedb_high = (description=(address=(protocol=tcps)(port=1522)(host=db.example.test)))\n';

describe('CredentialProvisionerService', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'provisioner-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stages both artifacts into their directories', async () => {
    const config = testJobConfig(join(root, 'nested', 'staging'));
    const blobs = new InMemoryBlobStore({ 'ewallet.pem': WALLET_PEM, 'tnsnames.ora': TNSNAMES });
    const provisioner = new CredentialProvisionerService(blobs, config);

    const staged = await provisioner.provision();

    const walletPath = join(config.staging.walletDir, 'ewallet.pem');
    const tnsPath = join(config.staging.configDir, 'tnsnames.ora');
    expect(staged).toEqual([
      { blobName: 'ewallet.pem', path: walletPath, bytes: Buffer.byteLength(WALLET_PEM) },
      { blobName: 'tnsnames.ora', path: tnsPath, bytes: Buffer.byteLength(TNSNAMES) },
    ]);
    expect(await readFile(walletPath, 'utf8')).toBe(WALLET_PEM);
    expect(await readFile(tnsPath, 'utf8')).toBe(TNSNAMES);
    expect(blobs.requests).toEqual([
      { container: 'db-wallet', blobName: 'ewallet.pem' },
      { container: 'db-wallet', blobName: 'tnsnames.ora' },
    ]);
  });

  it('leaves identical files when run twice', async () => {
    const config = testJobConfig(root);
    const provisioner = new CredentialProvisionerService(
      new InMemoryBlobStore({ 'ewallet.pem': WALLET_PEM, 'tnsnames.ora': TNSNAMES }),
      config,
    );

    await provisioner.provision();
    const first = await readFile(join(config.staging.walletDir, 'ewallet.pem'), 'utf8');
    await provisioner.provision();
    const second = await readFile(join(config.staging.walletDir, 'ewallet.pem'), 'utf8');

    expect(second).toBe(first);
    expect(await readFile(join(config.staging.configDir, 'tnsnames.ora'), 'utf8')).toBe(TNSNAMES);
  });

  it('overwrites previously staged content', async () => {
    const config = testJobConfig(root);
    await mkdir(config.staging.configDir, { recursive: true });
    await writeFile(join(config.staging.configDir, 'tnsnames.ora'), 'stale');

    await new CredentialProvisionerService(
      new InMemoryBlobStore({ 'ewallet.pem': WALLET_PEM, 'tnsnames.ora': TNSNAMES }),
      config,
    ).provision();

    expect(await readFile(join(config.staging.configDir, 'tnsnames.ora'), 'utf8')).toBe(TNSNAMES);
  });

  it('reports the artifact that could not be fetched and keeps the one already staged', async () => {
    const config = testJobConfig(root);
    const provisioner = new CredentialProvisionerService(
      new InMemoryBlobStore({ 'ewallet.pem': WALLET_PEM }),
      config,
    );

    const error = await provisioner.provision().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      blobName: 'tnsnames.ora',
      message: 'Failed to provision tnsnames.ora: Blob db-wallet/tnsnames.ora not found',
    });
    expect(existsSync(join(config.staging.walletDir, 'ewallet.pem'))).toBe(true);
    expect(existsSync(join(config.staging.configDir, 'tnsnames.ora'))).toBe(false);
  });

  it('reports local write failures as fetch errors', async () => {
    const config = testJobConfig(root);
    // A regular file where the wallet directory should be.
    await writeFile(config.staging.walletDir, 'not a directory');

    const provisioner = new CredentialProvisionerService(
      new InMemoryBlobStore({ 'ewallet.pem': WALLET_PEM, 'tnsnames.ora': TNSNAMES }),
      config,
    );

    await expect(provisioner.provision()).rejects.toMatchObject({
      name: 'FetchError',
      blobName: 'ewallet.pem',
    });
  });
});
