export { defaultChannel, defaultChannelGuaranteed, sortedChannels } from './default-channel.js';
