export { healthRoutes } from './health.js';
export { checkinRoutes } from './checkin.js';
export { capacityRoutes } from './capacity.js';
export { pickupRoutes } from './pickup.js';
export { authorizedPickupRoutes } from './authorizedPickups.js';
