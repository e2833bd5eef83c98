import { Router } from 'express';
import { StoryInput, toStoryResponse } from '../../shared/types';
import { getCaller, requireSession } from '../middleware/requireSession';
import type { StoryRegistry } from '../services/storyRegistry';
import {
  InvalidRequestError,
  parseAddress,
  parseAmount,
  parseBody,
  parseHex,
  parseString,
  parseTokenId,
  sendError,
} from './errors';

function parseStoryInput(body: unknown): StoryInput {
  const { title, description, audioCid, imageCid, royaltyPercent } = parseBody(body);
  if (typeof royaltyPercent !== 'number') {
    throw new InvalidRequestError('royaltyPercent debe ser un número');
  }
  return {
    title: parseString(title, 'title'),
    description: parseString(description ?? '', 'description'),
    audioCid: parseHex(audioCid, 'audioCid'),
    imageCid: parseHex(imageCid, 'imageCid'),
    royaltyPercent,
  };
}

export function createStoryRouter(registry: StoryRegistry, sessionSecret: string): Router {
  const router = Router();
  const auth = requireSession(sessionSecret);

  /**
   * Mintear una historia a nombre del usuario de la sesión
   * POST /api/stories
   */
  router.post('/', auth, async (req, res) => {
    try {
      const caller = getCaller(res);
      const tokenId = await registry.mint(caller, parseStoryInput(req.body));

      res.status(201).json({
        success: true,
        tokenId: tokenId.toString(),
      });
    } catch (error) {
      sendError(res, error, 'Error minteando historia');
    }
  });

  /**
   * Último token ID asignado (0 si no hay historias)
   * GET /api/stories/last-token-id
   */
  router.get('/last-token-id', (req, res) => {
    res.json({
      success: true,
      lastTokenId: registry.getLastTokenId().toString(),
    });
  });

  /**
   * Detalles de una historia
   * GET /api/stories/:tokenId
   */
  router.get('/:tokenId', (req, res) => {
    try {
      const tokenId = parseTokenId(req.params.tokenId);
      const story = registry.getStoryDetails(tokenId);

      res.json({
        success: true,
        story: story ? toStoryResponse(tokenId, story) : null,
      });
    } catch (error) {
      sendError(res, error, 'Error obteniendo historia');
    }
  });

  /**
   * Dueño actual del token
   * GET /api/stories/:tokenId/owner
   */
  router.get('/:tokenId/owner', async (req, res) => {
    try {
      const tokenId = parseTokenId(req.params.tokenId);
      const owner = await registry.getOwner(tokenId);

      res.json({
        success: true,
        tokenId: tokenId.toString(),
        owner: owner ?? null,
      });
    } catch (error) {
      sendError(res, error, 'Error obteniendo dueño');
    }
  });

  /**
   * URI de metadata (constante para todos los tokens)
   * GET /api/stories/:tokenId/uri
   */
  router.get('/:tokenId/uri', (req, res) => {
    try {
      const tokenId = parseTokenId(req.params.tokenId);

      res.json({
        success: true,
        tokenId: tokenId.toString(),
        uri: registry.getTokenUri(tokenId),
      });
    } catch (error) {
      sendError(res, error, 'Error obteniendo URI');
    }
  });

  /**
   * Transferir el token; el creador cobra regalía sobre el balance del remitente
   * POST /api/stories/:tokenId/transfer
   */
  router.post('/:tokenId/transfer', auth, async (req, res) => {
    try {
      const caller = getCaller(res);
      const tokenId = parseTokenId(req.params.tokenId);
      const body = parseBody(req.body);
      const sender = parseAddress(body.sender, 'sender');
      const recipient = parseAddress(body.recipient, 'recipient');

      await registry.transfer(caller, tokenId, sender, recipient);

      res.json({
        success: true,
        tokenId: tokenId.toString(),
        owner: recipient,
      });
    } catch (error) {
      sendError(res, error, 'Error transfiriendo historia');
    }
  });

  /**
   * Enviar propina al creador
   * POST /api/stories/:tokenId/tip
   */
  router.post('/:tokenId/tip', auth, async (req, res) => {
    try {
      const caller = getCaller(res);
      const tokenId = parseTokenId(req.params.tokenId);
      const amount = parseAmount(parseBody(req.body).amount, 'amount');

      await registry.tip(caller, tokenId, amount);

      res.json({
        success: true,
        tokenId: tokenId.toString(),
        amount: amount.toString(),
      });
    } catch (error) {
      sendError(res, error, 'Error enviando propina');
    }
  });

  return router;
}
