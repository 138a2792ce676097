
import { Router } from 'express';
import * as controller from './listings.controller';

const router = Router();

router.get('/', controller.getListings);
router.get('/lookups', controller.getLookups);

// Replace the in-memory inventory; the previous one stays active on failure
router.post('/reload', controller.reloadListings);
router.post('/upload', controller.uploadListings);

export default router;
