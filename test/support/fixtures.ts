import { INestApplication } from '@nestjs/common';
import request from 'supertest';

export const OWNER_PASSWORD = 'owner-pass-1';

export interface RegisteredTenant {
  token: string;
  refreshToken: string;
  userId: string;
  tenantId: string;
}

export async function registerTenant(
  app: INestApplication,
  tenantName: string,
  email = `owner@${tenantName}.test`,
): Promise<RegisteredTenant> {
  const res = await request(app.getHttpServer())
    .post('/api/v1/auth/register')
    .send({ tenant_name: tenantName, email, password: OWNER_PASSWORD })
    .expect(201);
  return {
    token: res.body.data.access_token,
    refreshToken: res.body.data.refresh_token,
    userId: res.body.data.user.id,
    tenantId: res.body.data.tenant_id,
  };
}

export async function createNamespace(
  app: INestApplication,
  token: string,
  name: string,
): Promise<string> {
  const res = await request(app.getHttpServer())
    .post('/api/v1/namespaces')
    .set('Authorization', `Bearer ${token}`)
    .send({ name })
    .expect(201);
  return res.body.data.id;
}

export const bearer = (token: string) => ({ Authorization: `Bearer ${token}` });
