import { Hono } from 'hono';

const health = new Hono();

health.get('/', (c) => c.text('OK', 200));

export default health;
