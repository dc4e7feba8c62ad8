import type { FastifyInstance } from 'fastify';
import { basicAuth } from './build-test-app';

export type AuthResponseBody = {
  status: 'AUTHENTICATED';
  username: string;
  role: 'VOLUNTEER' | 'ORGANIZER';
  token: string;
};

export async function register(
  app: FastifyInstance,
  input: {
    username: string;
    role: 'VOLUNTEER' | 'ORGANIZER';
    password?: string;
    skills?: string[];
    specializations?: string[];
  },
) {
  return app.inject({
    method: 'POST',
    url: '/auth/register',
    payload: {
      username: input.username,
      password: input.password ?? 'test-password',
      role: input.role,
      name: 'Test',
      surname: 'User',
      email: `${input.username}@example.com`,
      skills: input.skills,
      specializations: input.specializations,
    },
  });
}

/** Registers and returns the token issued at registration. */
export async function registerToken(
  app: FastifyInstance,
  username: string,
  role: 'VOLUNTEER' | 'ORGANIZER',
): Promise<string> {
  const res = await register(app, { username, role });
  if (res.statusCode !== 201) {
    throw new Error(`register ${username} failed: ${res.statusCode} ${res.body}`);
  }
  return res.json<AuthResponseBody>().token;
}

export async function login(app: FastifyInstance, username: string, password: string) {
  return app.inject({
    method: 'POST',
    url: '/auth/login',
    headers: { authorization: basicAuth(username, password) },
  });
}
