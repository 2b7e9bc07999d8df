import { Logger } from '@/engine/utils/Logger';

Logger.mute();
