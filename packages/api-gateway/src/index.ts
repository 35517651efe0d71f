import "dotenv/config";
import { startServer } from "./server.js";

void startServer();
