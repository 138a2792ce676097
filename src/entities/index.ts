import listingsRoutes from './listings/listings.router';
import searchRoutes from './search/search.router';

export { listingsRoutes, searchRoutes };
