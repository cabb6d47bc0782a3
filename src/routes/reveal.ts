import express, { Request, Response } from 'express';
import type { DrawStore } from '../store/types';

export function createRevealRouter(draws: DrawStore) {
  const router = express.Router();

  // Public: a participant opens their own assignment with the token they were given
  router.get('/:token', async (req: Request, res: Response) => {
    try {
      const found = await draws.findByRevealToken(req.params.token);

      if (!found) {
        return res.status(404).json({ error: 'Invalid reveal link' });
      }

      const { draw, assignment } = found;
      await draws.markRevealed(assignment.revealToken, new Date());

      res.json({
        draw: { title: draw.title },
        participant: assignment.giver,
        assignment: assignment.receiver,
        padding: assignment.padding,
      });
    } catch (error) {
      console.error('Error revealing assignment:', error);
      res.status(500).json({ error: 'Failed to reveal assignment' });
    }
  });

  return router;
}
