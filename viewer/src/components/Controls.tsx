import './Controls.css';

interface ControlsProps {
  onZoomIn: () => void;
  onZoomOut: () => void;
  onResetView: () => void;
}

function Controls({ onZoomIn, onZoomOut, onResetView }: ControlsProps) {
  return (
    <div className="controls">
      <button className="control-button" onClick={onZoomIn} title="Zoom In" aria-label="Zoom In">
        <svg viewBox="0 0 24 24" width="20" height="20">
          <path fill="currentColor" d="M19 13h-6v6h-2v-6H5v-2h6V5h2v6h6v2z" />
        </svg>
      </button>
      <button className="control-button" onClick={onZoomOut} title="Zoom Out" aria-label="Zoom Out">
        <svg viewBox="0 0 24 24" width="20" height="20">
          <path fill="currentColor" d="M19 13H5v-2h14v2z" />
        </svg>
      </button>
      <button className="control-button" onClick={onResetView} title="Reset View" aria-label="Reset View">
        <svg viewBox="0 0 24 24" width="20" height="20">
          <path
            fill="currentColor"
            d="M12 5V1L7 6l5 5V7c3.31 0 6 2.69 6 6s-2.69 6-6 6-6-2.69-6-6H4c0 4.42 3.58 8 8 8s8-3.58 8-8-3.58-8-8-8z"
          />
        </svg>
      </button>
    </div>
  );
}

export default Controls;
