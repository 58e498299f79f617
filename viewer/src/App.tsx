import { useEffect, useState } from 'react';
import { admitScene, resolveRenderConfig, type Scene } from '@iso-district/renderer';
import DistrictCanvas from './components/DistrictCanvas.js';
import Header from './components/Header.js';
import './App.css';

const RENDER_CONFIG = resolveRenderConfig();

type LoadState =
  | { status: 'loading' }
  | { status: 'ready'; scene: Scene }
  | { status: 'error'; message: string };

function describeScene(scene: Scene): string {
  return `${scene.buildings.length} buildings, ${scene.roads.length} roads, ${scene.stations.length} stations`;
}

function App() {
  const [state, setState] = useState<LoadState>({ status: 'loading' });

  useEffect(() => {
    let cancelled = false;

    fetch('./scene.json')
      .then((res) => {
        if (!res.ok) throw new Error(`Could not load scene.json (HTTP ${res.status})`);
        return res.json();
      })
      .then((payload: unknown) => {
        const { scene, report } = admitScene(payload);
        if (report.totalDropped > 0) {
          console.warn(`Dropped ${report.totalDropped} malformed scene entities:`, report.dropped);
        }
        if (!cancelled) setState({ status: 'ready', scene });
      })
      .catch((err) => {
        if (!cancelled) setState({ status: 'error', message: err instanceof Error ? err.message : String(err) });
      });

    return () => {
      cancelled = true;
    };
  }, []);

  return (
    <div className="app">
      <Header subtitle={state.status === 'ready' ? describeScene(state.scene) : 'Pixel-art district viewer'} />
      <main className="main-content">
        {state.status === 'loading' && <div className="status">Loading scene…</div>}
        {state.status === 'error' && <div className="status status-error">{state.message}</div>}
        {state.status === 'ready' && <DistrictCanvas scene={state.scene} config={RENDER_CONFIG} />}
        <div className="map-instructions">
          <span>Scroll to zoom</span>
          <span className="separator">|</span>
          <span>Drag to pan</span>
          <span className="separator">|</span>
          <span>Click a building to inspect</span>
        </div>
      </main>
    </div>
  );
}

export default App;
