import 'express-async-errors';
import express from 'express';
import apiRouter from './router';
import { errorHandler } from './other/errorHandler';

const app = express();

// Inventories can be large
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

app.use('/api', apiRouter);

app.use(errorHandler);

export default app;
