import { createApp } from "./app";
import { appConfig } from "./config/appConfig";

const app = createApp();

app.listen(appConfig.port, () => {
  console.log(`Flight search gateway running on http://localhost:${appConfig.port}`);
});
