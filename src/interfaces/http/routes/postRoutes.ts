/**
 * Post Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/posts`:
 *
 *   GET /search?q=coffee&lat=37.77&lng=-122.42&radius=5   →  controller.search
 *   GET /nearby?lat=37.77&lng=-122.42&radius=5            →  controller.nearby
 *   GET /city/San%20Francisco                             →  controller.byCity
 */
import { Router } from 'express';
import { PostController } from '@interfaces/http/controllers/PostController';

const router = Router();
const controller = new PostController();

router.get('/search', controller.search);
router.get('/nearby', controller.nearby);
router.get('/city/:cityName', controller.byCity);

export { router as postRoutes };
