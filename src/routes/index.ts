import { Router } from 'express';
import {
  createPlot,
  deletePlot,
  getPlot,
  health,
  listPlots,
  ping,
  updatePlot,
} from '../controllers/plotController';
import { validateBody } from '../middleware/validate';
import { plotCreateSchema } from '../validators/plot';

const router = Router();

router.get('/ping', ping);
router.get('/health', health);

router.get('/plots', listPlots);
router.post('/plots', validateBody(plotCreateSchema), createPlot);
router.get('/plots/:id', getPlot);
router.put('/plots/:id', validateBody(plotCreateSchema), updatePlot);
router.delete('/plots/:id', deletePlot);

export default router;
