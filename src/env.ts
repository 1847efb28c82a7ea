import "./setup-env";
import { cleanEnv, num, str, url } from "envalid";

const env = cleanEnv(process.env, {
  GITHUB_TOKEN: str({ default: "" }),
  GITHUB_API_URL: url({ default: "https://api.github.com" }),
  PAGE_DELAY_MS: num({ default: 200 }),
});

export default env;
