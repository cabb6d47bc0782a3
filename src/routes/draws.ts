import express, { Response } from 'express';
import { authenticateToken, AuthRequest } from '../middleware/auth';
import { ConfigurationError, PairingError } from '../pairing/errors';
import { createDraw, DrawServiceOptions } from '../services/drawService';
import type { Draw, DrawStore } from '../store/types';

export interface DrawRouterOptions extends DrawServiceOptions {
  jwtSecret: string;
}

function presentDraw(draw: Draw) {
  return {
    id: draw.id,
    title: draw.title,
    algorithm: draw.algorithm,
    seed: draw.seed,
    method: draw.method,
    created_at: draw.createdAt.toISOString(),
  };
}

export function createDrawsRouter(draws: DrawStore, options: DrawRouterOptions) {
  const router = express.Router();

  /**
   * The draw with this id, or null after answering 404 when it is missing
   * or belongs to another organiser
   */
  async function findOwnDraw(req: AuthRequest, res: Response): Promise<Draw | null> {
    const drawId = parseInt(req.params.id, 10);
    const draw = Number.isNaN(drawId) ? null : await draws.findById(drawId);

    if (!draw || draw.organiserId !== req.organiserId) {
      res.status(404).json({ error: 'Draw not found' });
      return null;
    }
    return draw;
  }

  router.use(authenticateToken(options.jwtSecret));

  // Run a new draw
  router.post('/', async (req: AuthRequest, res: Response) => {
    try {
      const organiserId = req.organiserId;
      if (organiserId === undefined) {
        return res.status(401).json({ error: 'Access token required' });
      }

      const created = await createDraw(draws, organiserId, req.body, options);
      const { draw, revealLinks, fallbackReason } = created;

      console.log(
        `Draw ${draw.id} created for ${revealLinks.length} participants with the ${draw.method} search` +
          (fallbackReason ? ` (no single cycle: ${fallbackReason})` : '')
      );

      res.status(201).json({ draw: presentDraw(draw), reveal_links: revealLinks });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return res.status(400).json({ error: error.message });
      }
      if (error instanceof PairingError) {
        return res.status(422).json({ error: error.message });
      }
      console.error('Error creating draw:', error);
      res.status(500).json({ error: 'Failed to create draw' });
    }
  });

  // List the organiser's draws
  router.get('/', async (req: AuthRequest, res: Response) => {
    try {
      const organiserId = req.organiserId;
      if (organiserId === undefined) {
        return res.status(401).json({ error: 'Access token required' });
      }

      const summaries = await draws.listByOrganiser(organiserId);

      res.json({
        draws: summaries.map((summary) => ({
          ...presentDraw(summary),
          participant_count: summary.participantCount,
          revealed_count: summary.revealedCount,
        })),
      });
    } catch (error) {
      console.error('Error fetching draws:', error);
      res.status(500).json({ error: 'Failed to fetch draws' });
    }
  });

  // Draw detail with reveal links, without the pairing
  router.get('/:id', async (req: AuthRequest, res: Response) => {
    try {
      const draw = await findOwnDraw(req, res);
      if (!draw) {
        return;
      }

      const assignments = await draws.listAssignments(draw.id);

      res.json({
        draw: presentDraw(draw),
        participants: assignments.map((assignment) => ({
          participant: assignment.giver,
          token: assignment.revealToken,
          revealed: assignment.revealedAt !== null,
        })),
      });
    } catch (error) {
      console.error('Error fetching draw:', error);
      res.status(500).json({ error: 'Failed to fetch draw' });
    }
  });

  // Full pairing; reading it spoils the draw for the organiser
  router.get('/:id/results', async (req: AuthRequest, res: Response) => {
    try {
      const draw = await findOwnDraw(req, res);
      if (!draw) {
        return;
      }

      const assignments = await draws.listAssignments(draw.id);

      res.json({
        draw: presentDraw(draw),
        pairs: assignments.map(({ giver, receiver }) => ({ giver, receiver })),
      });
    } catch (error) {
      console.error('Error fetching draw results:', error);
      res.status(500).json({ error: 'Failed to fetch draw results' });
    }
  });

  router.delete('/:id', async (req: AuthRequest, res: Response) => {
    try {
      const draw = await findOwnDraw(req, res);
      if (!draw) {
        return;
      }

      await draws.delete(draw.id);

      res.json({ message: 'Draw deleted successfully' });
    } catch (error) {
      console.error('Error deleting draw:', error);
      res.status(500).json({ error: 'Failed to delete draw' });
    }
  });

  return router;
}
