/**
 * Application Source
 *
 * Main application module exports.
 */

export {
  registerRoutes,
  registerHomeRoutes,
  createInfoHandler,
  createUserRouter,
  generateProducts,
  EXAMPLE_PRODUCT,
  USERS,
  type Product,
  type User,
} from './routes/mod.ts';
