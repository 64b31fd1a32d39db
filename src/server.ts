import http from "http";
import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { attachSignalStream, createSignalWss } from "./signalSocket";

dotenv.config();

const config = loadConfig();
const app = createApp(config);
const signalWss = createSignalWss();

const server = http.createServer(app);

attachSignalStream(server, signalWss, config.streamPath);

server.listen(config.port, () => {
  console.log(`Server is running on port ${config.port}`);
  console.log(`Signal stream at ws://localhost:${config.port}${config.streamPath}`);
});
