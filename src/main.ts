import { startFrameLoop } from './sim/frameLoop';
import { createControlsStore } from './state/controls';
import { selectLabels } from './state/selectors';
import { createSimulationStore } from './state/store';

// Headless run of the default scenario: `npm start -- [seconds] [seed]`
const seconds = Number(process.argv[2] ?? 30);
const seed = process.argv[3];

const started = performance.now();
const stamp = () => ((performance.now() - started) / 1000).toFixed(1);

const controls = createControlsStore({ distancingEnabled: true, distancingPercent: 60 });
const sim = createSimulationStore({
  controls,
  seed,
  onEvent: (text) => console.log(`[${stamp()}s] ${text}`),
});
const { actions } = sim.getState();
actions.randomizeDistancers();
actions.infectOne();

const stop = startFrameLoop((dt) => actions.tick(dt), { fps: 120 });
const report = setInterval(() => {
  const line = selectLabels(sim.getState()).map(([k, v]) => `${k}: ${v}`).join(' | ');
  console.log(line);
}, 1000);

setTimeout(() => {
  stop();
  clearInterval(report);
  actions.dispose();
}, (Number.isFinite(seconds) && seconds > 0 ? seconds : 30) * 1000);
