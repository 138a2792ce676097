
import { Router, Request, Response } from "express";
import { listingsRoutes, searchRoutes } from "./entities";

const apiRouter = Router();
apiRouter.get("/health", (req: Request, res: Response) => {
    res.json({ success: true });
})

// Inventario de terrenos
apiRouter.use('/listings', listingsRoutes);

// Búsqueda y ranking
apiRouter.use('/search', searchRoutes);

export default apiRouter
