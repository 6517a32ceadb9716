import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 Spending Tagger API listening on port ${port}`);
  console.log(`📂 Raw exports: ${container.config.storage.rawDir}`);
  console.log(`💾 Dataset: ${container.config.storage.processedFile}`);
});
