import packageJson from '../../../package.json';

export const logVersion = () => `Gridlab version: v${packageJson.version}, Node version: ${process.version}`;

export const wait = (waitingTime: number) => new Promise(resolve => setTimeout(resolve, waitingTime));
