export { analogSineWave, sampleTimes, validateAnalogParams } from './sine';
export type { AnalogParams, AnalogPoint } from './sine';
export { pcmFromAnalog, pcmSampledWave, quantize } from './pcm';
export { deltaModFromAnalog } from './delta';
export { parseAnalogParams } from './params';
