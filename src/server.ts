import bodyParser from "body-parser";
import cors from "cors";
import express, { type Request, type Response } from "express";
import helmet from "helmet";
import type { AppConfig } from "./config";
import NavController from "./controllers/NavController";
import { Logging } from "./libs/Logging";
import type { NavigationService } from "./services/navigationService";
import { NOT_FOUND } from "./utils/common/responseCodes";
import { jsonParseErrorHandler } from "./utils/helpers/errorHandling";

type ServerOptions = {
  navigation: NavigationService;
  http: Pick<AppConfig["http"], "apiPrefix" | "corsOrigins" | "logFormat">;
  healthDetails?: () => Record<string, unknown>;
};

export function createServer(options: ServerOptions) {
  const { corsOrigins, apiPrefix, logFormat } = options.http;
  const app = express();

  app.use(helmet());
  app.use(cors(corsOrigins.length > 0 ? { origin: corsOrigins } : undefined));
  app.disable("x-powered-by");
  app.use(bodyParser.json());
  app.use(jsonParseErrorHandler);
  app.use(Logging(logFormat));

  const controller = new NavController(
    options.navigation,
    options.healthDetails,
  );
  app.use(apiPrefix || "/", controller.routes());

  app.use((_req: Request, res: Response) => {
    res.status(NOT_FOUND).json({ error: "NOT_FOUND" });
  });

  return app;
}
