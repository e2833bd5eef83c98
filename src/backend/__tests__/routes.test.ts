import request from 'supertest';
import type { Express } from 'express';
import type { Address } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { createApp } from '../app';
import { openStoryRegistry } from '../bootstrap';
import type { AppConfig } from '../config';
import { buildLoginMessage, issueSessionToken } from '../services/sessionService';

const SECRET = 'test-secret';
const TOKEN_URI = 'https://story-registry.app/metadata/';
const creator: Address = '0x1111111111111111111111111111111111111111';
const buyer: Address = '0x2222222222222222222222222222222222222222';
const other: Address = '0x3333333333333333333333333333333333333333';

const baseConfig: AppConfig = {
  port: 0,
  sessionSecret: SECRET,
  tokenUri: TOKEN_URI,
  faucetEnabled: true,
  corsOrigins: ['http://localhost:5173'],
};

const story = {
  title: 'Test Story',
  description: 'A test story description',
  audioCid: `0x${'11'.repeat(32)}`,
  imageCid: `0x${'22'.repeat(32)}`,
  royaltyPercent: 10,
};

function bearer(address: Address): string {
  return `Bearer ${issueSessionToken(address, SECRET)}`;
}

async function buildApp(config: AppConfig = baseConfig): Promise<Express> {
  const { registry, funds } = await openStoryRegistry(config);
  return createApp({ config, registry, funds });
}

describe('HTTP API', () => {
  let app: Express;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    app = await buildApp();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function mint(caller: Address = creator, body: object = story) {
    return request(app).post('/api/stories').set('Authorization', bearer(caller)).send(body);
  }

  async function fund(address: Address, amount: string) {
    return request(app).post('/api/balance/faucet').send({ address, amount });
  }

  it('GET /health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  describe('POST /api/stories', () => {
    it('requires a session', async () => {
      const res = await request(app).post('/api/stories').send(story);

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ success: false, error: 'UNAUTHENTICATED' });
    });

    it('rejects an invalid session token', async () => {
      const res = await request(app).post('/api/stories').set('Authorization', 'Bearer nope').send(story);

      expect(res.status).toBe(401);
    });

    it('mints and advances the last token id', async () => {
      const res = await mint();

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ success: true, tokenId: '1' });

      const last = await request(app).get('/api/stories/last-token-id');
      expect(last.body).toEqual({ success: true, lastTokenId: '1' });
    });

    it('maps an empty title to InvalidStory 400', async () => {
      const res = await mint(creator, { ...story, title: '' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ success: false, error: 'InvalidStory', code: 400 });

      const last = await request(app).get('/api/stories/last-token-id');
      expect(last.body.lastTokenId).toBe('0');
    });

    it('maps a royalty above 100 to InvalidStory 400', async () => {
      const res = await mint(creator, { ...story, royaltyPercent: 101 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('InvalidStory');
    });

    it('answers a malformed JSON body with INVALID_REQUEST', async () => {
      const res = await request(app)
        .post('/api/stories')
        .set('Authorization', bearer(creator))
        .set('Content-Type', 'application/json')
        .send('{"title": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'INVALID_REQUEST', message: 'El body no es JSON válido' });
    });

    it('rejects malformed fields as INVALID_REQUEST', async () => {
      const res = await mint(creator, { ...story, royaltyPercent: '10' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ success: false, error: 'INVALID_REQUEST' });
    });
  });

  describe('queries', () => {
    it('returns the stored story and its owner', async () => {
      await mint();

      const details = await request(app).get('/api/stories/1');
      const owner = await request(app).get('/api/stories/1/owner');

      expect(details.body).toEqual({
        success: true,
        story: { tokenId: '1', ...story, creator },
      });
      expect(owner.body).toEqual({ success: true, tokenId: '1', owner: creator });
    });

    it('returns null for an unminted token', async () => {
      const details = await request(app).get('/api/stories/999');
      const owner = await request(app).get('/api/stories/999/owner');

      expect(details.status).toBe(200);
      expect(details.body.story).toBeNull();
      expect(owner.body.owner).toBeNull();
    });

    it('returns the constant token uri', async () => {
      const res = await request(app).get('/api/stories/42/uri');

      expect(res.body).toEqual({ success: true, tokenId: '42', uri: TOKEN_URI });
    });

    it('rejects a non-numeric token id', async () => {
      const res = await request(app).get('/api/stories/abc');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('INVALID_REQUEST');
    });
  });

  describe('POST /api/stories/:tokenId/transfer', () => {
    it('returns 404 for an unknown token', async () => {
      const res = await request(app)
        .post('/api/stories/7/transfer')
        .set('Authorization', bearer(creator))
        .send({ sender: creator, recipient: buyer });

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: 'StoryNotFound', code: 404 });
    });

    it('returns 403 when the caller is not the sender', async () => {
      await mint();

      const res = await request(app)
        .post('/api/stories/1/transfer')
        .set('Authorization', bearer(other))
        .send({ sender: creator, recipient: buyer });

      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({ error: 'Unauthorized', code: 403 });
    });

    it('returns 409 with the ledger code when the sender does not hold the token', async () => {
      await mint();

      const res = await request(app)
        .post('/api/stories/1/transfer')
        .set('Authorization', bearer(other))
        .send({ sender: other, recipient: buyer });

      expect(res.status).toBe(409);
      expect(res.body.error).toBe('not-owner');
    });

    it('moves the token and pays the royalty to the creator', async () => {
      await mint();
      await request(app)
        .post('/api/stories/1/transfer')
        .set('Authorization', bearer(creator))
        .send({ sender: creator, recipient: buyer });
      await fund(buyer, '1000');

      const res = await request(app)
        .post('/api/stories/1/transfer')
        .set('Authorization', bearer(buyer))
        .send({ sender: buyer, recipient: other });

      expect(res.body).toEqual({ success: true, tokenId: '1', owner: other });
      const owner = await request(app).get('/api/stories/1/owner');
      const buyerBalance = await request(app).get(`/api/balance/${buyer}`);
      const creatorBalance = await request(app).get(`/api/balance/${creator}`);
      expect(owner.body.owner).toBe(other);
      expect(buyerBalance.body.balance).toBe('900');
      expect(creatorBalance.body.balance).toBe('100');
    });
  });

  describe('POST /api/stories/:tokenId/tip', () => {
    it('maps a zero amount to InsufficientFunds 402', async () => {
      await mint();

      const res = await request(app).post('/api/stories/1/tip').set('Authorization', bearer(buyer)).send({ amount: 0 });

      expect(res.status).toBe(402);
      expect(res.body).toMatchObject({ error: 'InsufficientFunds', code: 402 });
    });

    it('credits the creator with the tip', async () => {
      await mint();
      await fund(buyer, '1000');

      const res = await request(app)
        .post('/api/stories/1/tip')
        .set('Authorization', bearer(buyer))
        .send({ amount: '100' });

      expect(res.body).toEqual({ success: true, tokenId: '1', amount: '100' });
      const creatorBalance = await request(app).get(`/api/balance/${creator}`);
      expect(creatorBalance.body.balance).toBe('100');
    });

    it('returns 409 when the tipper cannot pay', async () => {
      await mint();

      const res = await request(app)
        .post('/api/stories/1/tip')
        .set('Authorization', bearer(buyer))
        .send({ amount: 100 });

      expect(res.status).toBe(409);
      expect(res.body.error).toBe('insufficient-balance');
    });
  });

  describe('balance', () => {
    it('reports zero for a fresh address', async () => {
      const res = await request(app).get(`/api/balance/${other}`);

      expect(res.body).toEqual({ success: true, address: other, balance: '0' });
    });

    it('hides the faucet when it is disabled', async () => {
      const locked = await buildApp({ ...baseConfig, faucetEnabled: false });

      const res = await request(locked).post('/api/balance/faucet').send({ address: buyer, amount: '10' });

      expect(res.status).toBe(404);
    });
  });

  describe('wallet session', () => {
    it('issues a token for a valid signature that authorizes minting', async () => {
      const account = privateKeyToAccount(generatePrivateKey());
      const issuedAt = new Date().toISOString();
      const signature = await account.signMessage({ message: buildLoginMessage(account.address, issuedAt) });

      const session = await request(app)
        .post('/api/wallet/session')
        .send({ address: account.address, issuedAt, signature });

      expect(session.status).toBe(200);
      expect(session.body.address).toBe(account.address);

      const minted = await request(app)
        .post('/api/stories')
        .set('Authorization', `Bearer ${session.body.token}`)
        .send(story);
      const owner = await request(app).get(`/api/stories/${minted.body.tokenId}/owner`);
      expect(owner.body.owner).toBe(account.address);
    });

    it('rejects a signature from another key', async () => {
      const account = privateKeyToAccount(generatePrivateKey());
      const intruder = privateKeyToAccount(generatePrivateKey());
      const issuedAt = new Date().toISOString();
      const signature = await intruder.signMessage({ message: buildLoginMessage(account.address, issuedAt) });

      const res = await request(app)
        .post('/api/wallet/session')
        .send({ address: account.address, issuedAt, signature });

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('INVALID_SIGNATURE');
    });

    it('rejects a stale login', async () => {
      const account = privateKeyToAccount(generatePrivateKey());
      const issuedAt = new Date(Date.now() - 10 * 60 * 1000).toISOString();
      const signature = await account.signMessage({ message: buildLoginMessage(account.address, issuedAt) });

      const res = await request(app)
        .post('/api/wallet/session')
        .send({ address: account.address, issuedAt, signature });

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('LOGIN_EXPIRED');
    });

    it('serves the login message for an address', async () => {
      const issuedAt = '2026-01-01T00:00:00.000Z';

      const res = await request(app).get(`/api/wallet/login-message/${creator}`).query({ issuedAt });

      expect(res.body).toEqual({
        success: true,
        address: creator,
        issuedAt,
        message: buildLoginMessage(creator, issuedAt),
      });
    });
  });
});
