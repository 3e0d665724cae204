import { pino } from "pino";
import { startServer } from "./start.js";

const port = Number(process.env.PORT || 0) || 4110;
const logger = pino({ name: "ledger-service" });

startServer({ port }, logger).catch(() => {
  process.exit(1);
});
