import { PALETTE } from './palette.js';
import type { Building, UsageCategory } from './scene.js';
import type { DrawingSurface, FontSpec } from './surface.js';

export const USAGE_LABELS: Record<UsageCategory, string> = {
  office: 'Office',
  shop: 'Shop',
  hotel: 'Hotel',
  commercial: 'Commercial',
  house: 'House',
  apartment: 'Apartment',
  shop_house: 'Shop+House',
  shop_apartment: 'Shop+Apt',
  workshop_house: 'Workshop',
  government: 'Government',
  school: 'School',
  transport: 'Transport',
  factory: 'Factory',
  unknown: 'Unknown',
};

export interface InspectorLine {
  label: string;
  value: string;
}

export interface InspectorLayout {
  title: string;
  lines: InspectorLine[];
  x: number;
  y: number;
  width: number;
  height: number;
}

const TITLE_FONT: FontSpec = { size: 14, bold: true };
const BODY_FONT: FontSpec = { size: 12 };
const HINT_FONT: FontSpec = { size: 10 };

const PAD_X = 14;
const PAD_Y = 10;
const LINE_HEIGHT = 18;
const VALUE_COLUMN = 90;
const MARGIN_RIGHT = 16;
const TOP = 60;

export const CLOSE_HINT = 'click elsewhere to close';

export function inspectorLines(building: Building): InspectorLine[] {
  const lines: InspectorLine[] = [
    { label: 'Height:', value: `${building.surveyedHeight.toFixed(1)} m` },
    { label: 'Floors:', value: String(building.floors) },
    { label: 'Usage:', value: USAGE_LABELS[building.usage] },
  ];
  if (building.hero) {
    lines.push({ label: 'Status:', value: 'Landmark' });
  }
  return lines;
}

/**
 * Size the panel from measured text and pin it to the top-right corner.
 */
export function layoutInspector(
  building: Building,
  displayWidth: number,
  measure: (text: string, font: FontSpec) => number
): InspectorLayout {
  const title = building.name || 'Building';
  const lines = inspectorLines(building);

  let maxWidth = measure(title, TITLE_FONT);
  for (const line of lines) {
    const width = Math.max(
      measure(`${line.label}  ${line.value}`, BODY_FONT),
      VALUE_COLUMN - 2 + measure(line.value, BODY_FONT)
    );
    maxWidth = Math.max(maxWidth, width);
  }

  const width = maxWidth + PAD_X * 2 + 20;
  const height = PAD_Y * 2 + 22 + lines.length * LINE_HEIGHT + 8;

  return {
    title,
    lines,
    x: displayWidth - width - MARGIN_RIGHT,
    y: TOP,
    width,
    height,
  };
}

/**
 * Draw the selection panel on the full-resolution display surface.
 */
export function drawInspector(display: DrawingSurface, building: Building): InspectorLayout {
  const layout = layoutInspector(building, display.width, (text, font) => display.measureText(text, font));
  const { x, y, width, height } = layout;
  const colors = PALETTE.inspector;

  display.fillRect(x, y, width, height, { color: colors.background, alpha: colors.backgroundAlpha });
  display.strokeRect(x + 1, y + 1, width - 2, height - 2, { color: colors.accent, width: 2 });
  display.strokeRect(x + 4, y + 4, width - 8, height - 8, { color: colors.frame, width: 1 });

  display.fillText(layout.title, x + PAD_X + 2, y + PAD_Y + 14, {
    color: colors.accent,
    font: TITLE_FONT,
    align: 'left',
  });

  const separatorY = y + PAD_Y + 22;
  display.strokePolyline(
    [
      { x: x + PAD_X, y: separatorY },
      { x: x + width - PAD_X, y: separatorY },
    ],
    { color: colors.frame, width: 1 }
  );

  layout.lines.forEach((line, i) => {
    const lineY = separatorY + 6 + (i + 1) * LINE_HEIGHT;
    display.fillText(line.label, x + PAD_X + 2, lineY, { color: colors.label, font: BODY_FONT, align: 'left' });
    display.fillText(line.value, x + PAD_X + VALUE_COLUMN, lineY, {
      color: colors.value,
      font: BODY_FONT,
      align: 'left',
    });
  });

  display.fillText(CLOSE_HINT, x + PAD_X + 2, y + height - 8, { color: colors.hint, font: HINT_FONT, align: 'left' });

  return layout;
}
