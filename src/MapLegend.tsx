import React from 'react';
import { LOT_STATUSES, STATUS_COLORS, STATUS_LABELS } from './availability';

export function MapLegend() {
  return (
    <ul className="legend" aria-label="Marker colors">
      {LOT_STATUSES.map((s) => (
        <li key={s}>
          <span className="legendDot" style={{ background: STATUS_COLORS[s] }} aria-hidden="true" />
          {STATUS_LABELS[s]}
        </li>
      ))}
    </ul>
  );
}
