import { createApp } from './app';
import { config } from './config';

const { app } = createApp();

app.listen(config.port, () => {
  console.log(`[blog-api] listening on http://localhost:${config.port}`);
});
