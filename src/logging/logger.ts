import pino from "pino"
import { config } from "../config"

export const logger = pino({
  name: "microshard-uuid",
  level: config.log.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
})
