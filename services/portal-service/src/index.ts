import 'dotenv/config';
import { startService } from '@loginwall/service-template';
import { loadPortalConfig } from './config';
import { createPortalApp } from './app';

const config = loadPortalConfig();
startService(createPortalApp(config), config.port);
