import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { Update } from 'telegraf/typings/core/types/typegram';
import bot from '../TuneDrop/bot';

function isUpdate(value: unknown): value is Update {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'update_id') === 'number';
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return res.status(200).send('OK');
  }

  const secret = process.env.WEBHOOK_SECRET;
  if (secret && req.query.secret !== secret) {
    return res.status(403).send('Forbidden');
  }

  try {
    const update: unknown = typeof req.body === 'string' ? JSON.parse(req.body) : req.body;
    if (!isUpdate(update)) {
      return res.status(400).send('Bad Request');
    }
    await bot.handleUpdate(update);
    res.status(200).send('OK');
  } catch (err) {
    console.error('[webhook] failed to handle update', err);
    res.status(500).end();
  }
}
