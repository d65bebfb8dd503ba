import { Router, Request, Response } from "express";
import { describeNotFound, describeReceiptError } from "../models/errors";
import { getReceiptPoints, processReceipt, ReceiptServiceDeps } from "../services/receiptService";
import { logger } from "../utils/logger";

export function createReceiptsRouter(deps: ReceiptServiceDeps): Router {
  const router = Router();

  router.post('/receipts/process', (req: Request, res: Response) => {
    const result = processReceipt(req.body, deps);
    if (!result.ok) {
      const message = describeReceiptError(result.error);
      logger.debug(`Rejected receipt: ${message}`);
      return res.status(400).json({ error: message });
    }
    logger.info(`Processed receipt ${result.value.id}: ${result.value.points} points`);
    res.status(200).json({ id: result.value.id });
  });

  router.get('/receipts/:id/points', (req: Request, res: Response) => {
    const result = getReceiptPoints(req.params.id, deps.store);
    if (!result.ok) {
      logger.debug(`Unknown receipt id requested: ${result.error.id}`);
      return res.status(404).json({ error: describeNotFound(result.error) });
    }
    res.status(200).json({ points: result.value.points });
  });

  return router;
}
