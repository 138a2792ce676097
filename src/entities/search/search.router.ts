
import { Router } from 'express';
import * as controller from './search.controller';

const router = Router();

router.get('/', controller.searchByQuery);
router.post('/', controller.searchByCriteria);

export default router;
