import pino from "pino";
import config from "@/config";

const logger = pino({
  level: config.logging.level,
  redact: {
    paths: [
      "apiKey",
      "*.apiKey",
      "secretAccessKey",
      "*.secretAccessKey",
      "sessionToken",
      "*.sessionToken",
      "headers.authorization",
    ],
    censor: "***",
  },
});

export default logger;
