import express, { Request, Response } from 'express';
import bcrypt from 'bcryptjs';
import * as z from 'zod';
import { authenticateToken, AuthRequest, signOrganiserToken } from '../middleware/auth';
import type { Organiser, OrganiserStore } from '../store/types';

const SALT_ROUNDS = 10;

function presentOrganiser(organiser: Organiser) {
  return {
    id: organiser.id,
    username: organiser.username,
    display_name: organiser.displayName || organiser.username,
  };
}

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  display_name: z.string().optional(),
});

function readCredentials(body: unknown): z.infer<typeof credentialsSchema> | null {
  const result = credentialsSchema.safeParse(body);
  return result.success ? result.data : null;
}

export function createAuthRouter(organisers: OrganiserStore, jwtSecret: string) {
  const router = express.Router();

  // Register
  router.post('/register', async (req: Request, res: Response) => {
    try {
      const credentials = readCredentials(req.body);

      if (!credentials) {
        return res.status(400).json({ error: 'Username and password are required' });
      }

      const { username, password } = credentials;

      if (username.length < 3) {
        return res.status(400).json({ error: 'Username must be at least 3 characters' });
      }

      if (password.length < 6) {
        return res.status(400).json({ error: 'Password must be at least 6 characters' });
      }

      if (!/^[a-zA-Z0-9_]+$/.test(username)) {
        return res.status(400).json({ error: 'Username can only contain letters, numbers, and underscores' });
      }

      const normalized = username.toLowerCase().trim();
      if (await organisers.findByUsername(normalized)) {
        return res.status(400).json({ error: 'Username already taken' });
      }

      const displayName = credentials.display_name;
      if (displayName !== undefined && displayName.length > 100) {
        return res.status(400).json({ error: 'Display name must be 100 characters or less' });
      }

      const organiser = await organisers.create({
        username: normalized,
        passwordHash: await bcrypt.hash(password, SALT_ROUNDS),
        displayName: displayName?.trim() || null,
      });

      const token = signOrganiserToken({ organiserId: organiser.id, username: organiser.username }, jwtSecret);

      res.status(201).json({ token, organiser: presentOrganiser(organiser) });
    } catch (error) {
      console.error('Registration error:', error);
      res.status(500).json({ error: 'Failed to register organiser' });
    }
  });

  // Login
  router.post('/login', async (req: Request, res: Response) => {
    try {
      const credentials = readCredentials(req.body);

      if (!credentials) {
        return res.status(400).json({ error: 'Username and password are required' });
      }

      const organiser = await organisers.findByUsername(credentials.username.toLowerCase().trim());

      if (!organiser || !(await bcrypt.compare(credentials.password, organiser.passwordHash))) {
        return res.status(401).json({ error: 'Invalid username or password' });
      }

      const token = signOrganiserToken({ organiserId: organiser.id, username: organiser.username }, jwtSecret);

      res.json({ token, organiser: presentOrganiser(organiser) });
    } catch (error) {
      console.error('Login error:', error);
      res.status(500).json({ error: 'Failed to login' });
    }
  });

  // Current organiser
  router.get('/me', authenticateToken(jwtSecret), async (req: AuthRequest, res: Response) => {
    try {
      const organiser = req.organiserId === undefined ? null : await organisers.findById(req.organiserId);

      if (!organiser) {
        return res.status(404).json({ error: 'Organiser not found' });
      }

      res.json({ organiser: presentOrganiser(organiser) });
    } catch (error) {
      console.error('Token verification error:', error);
      res.status(500).json({ error: 'Failed to verify token' });
    }
  });

  return router;
}
