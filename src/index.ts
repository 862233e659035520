import { createServer } from "http";
import { createApp } from "./app.js";
import { createAppContext } from "./context.js";
import { initializeAlertStream } from "./web/alertStream.js";

const ctx = createAppContext();
ctx.platform.logPlatformStatus();

const app = createApp(ctx);
const server = createServer(app);
initializeAlertStream(server, ctx.platform);

const port = ctx.config.port;
server.listen(port, () => console.log(`Server listening on :${port} - API docs at http://localhost:${port}/docs`));
