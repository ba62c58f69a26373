import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createHttpApp } from './infrastructure/http/HttpApp.js';

const container = new AppContainer();
const app = createHttpApp(container);
const port = container.config.server.port;

app.listen(port, () => {
  container.logger.info(
    { port, env: container.config.app.env },
    'Transaction Format Converter API listening',
  );
});
