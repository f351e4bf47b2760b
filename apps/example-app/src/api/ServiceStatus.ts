import { statusRouter } from './routers';

@statusRouter.get('/status')
export class ServiceStatus {
    healthy = false;
    version = 'unknown';
}
