import { createApp } from "./app";
import { keyFingerprint, loadConfig } from "./config";
import { createContext } from "./context";

const config = loadConfig();
const app = createApp({ context: createContext(config) });

app.listen(config.port, () => {
  console.log(`Backend listening on http://localhost:${config.port}`);
  if (config.openaiApiKey) {
    console.log(`[Startup] OPENAI_API_KEY present: ${keyFingerprint(config.openaiApiKey)}`);
  } else {
    console.warn("[Startup] Warning: OPENAI_API_KEY environment variable not set");
  }
  console.log(`[Startup] OPENAI_MODEL: ${config.openaiModel}`);
  console.log(`[Startup] Video metadata via ${config.youtubeApiKey ? "YouTube Data API" : "InnerTube"}`);
});
