import { DEFAULT_TEXT_COLOR, type DashboardLayout } from '../config/launchConfig';
import type { Launch } from '../launches/launch';
import {
  LAUNCH_FAILURE_ICON,
  LAUNCH_SUCCESS_ICON,
  RECOVERY_FAILURE_ICON,
  RECOVERY_PARTIAL_ICON,
  RECOVERY_SUCCESS_ICON
} from './icons';

export interface TileOptions {
  showName: boolean;
  showLocality: boolean;
  dashboardLayout: DashboardLayout;
  textColor: string;
}

export interface TileLaunch {
  launch: Launch;
  timeStr: string;
}

interface TileLayout {
  imageWidth: string;
  margin: string;
  fontStyle: string;
}

export const EMPTY_TILE = "<div style='overflow:auto;'></div>";
export const NAME_PLACEHOLDER = 'Name Unavailable';
export const LOCATION_PLACEHOLDER = 'Location Unavailable';

const SCALABLE_FONT = 'font-size: min(10vh, 10vw)';

// Largeur de l'écusson selon le nombre de lignes de texte, par type de dashboard.
const IMAGE_WIDTHS: Record<DashboardLayout, Record<number, string>> = {
  compact: { 2: '90%', 3: '90%', 4: '70%' },
  scalable: { 2: '90%', 3: '70%', 4: '50%' }
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function hasOutcome(launch: Launch): boolean {
  return launch.status === 'Launched' || launch.status === 'Failed';
}

function tileLayout(layout: DashboardLayout, lineCount: number): TileLayout {
  return {
    imageWidth: IMAGE_WIDTHS[layout][lineCount] ?? '100%',
    margin: layout === 'scalable' ? '-10%' : '-25%',
    fontStyle: layout === 'scalable' ? SCALABLE_FONT : ''
  };
}

function outcomeIcons(launch: Launch): string {
  let icons = '';
  if (launch.status === 'Launched') icons += LAUNCH_SUCCESS_ICON;
  else if (launch.status === 'Failed') icons += LAUNCH_FAILURE_ICON;

  if (launch.coreRecovery === 'Success') icons += RECOVERY_SUCCESS_ICON;
  else if (launch.coreRecovery === 'Failure') icons += RECOVERY_FAILURE_ICON;
  else if (launch.coreRecovery === 'PartialSuccess') icons += RECOVERY_PARTIAL_ICON;
  return icons;
}

/**
 * Tuile HTML du lancement affiché : écusson, puis nom, horaire, lieu et
 * icônes de résultat selon les options.
 */
export function renderTile(selected: TileLaunch | null, options: TileOptions): string {
  if (!selected) return EMPTY_TILE;
  const { launch, timeStr } = selected;

  const lines: string[] = [];
  if (options.showName) lines.push(`<b>${escapeHtml(launch.name ?? NAME_PLACEHOLDER)}</b>`);
  lines.push(escapeHtml(timeStr));
  if (options.showLocality) lines.push(escapeHtml(launch.locality ?? LOCATION_PLACEHOLDER));

  const showOutcome = hasOutcome(launch);
  const layout = tileLayout(options.dashboardLayout, lines.length + (showOutcome ? 1 : 0));
  const color =
    options.textColor.toLowerCase() !== DEFAULT_TEXT_COLOR ? `color: ${options.textColor};` : '';

  let tile = `<div style='text-align:center;padding:0px;height:100%;'>`;
  tile += `<img src='${escapeHtml(launch.patchUrl)}' style='width:${layout.imageWidth}; top:0px;'>`;
  tile += '</div>';
  tile += `<div style='text-align:center;margin-top:${layout.margin};${color}'>`;
  for (const line of lines) {
    tile += `<p style='margin:0px;${layout.fontStyle}'>${line}</p>`;
  }
  if (showOutcome) {
    tile += `<div style='text-align:center;margin:0px;'>${outcomeIcons(launch)}</div>`;
  }
  tile += '</div>';
  return tile;
}
