const ROCKET_PATH =
  'M 13.2 12.4 L 13.2 10 C 13.2 4.6 10.9 1.3 10 0.2 C 9.9 0.07 9.7 0 9.55 0 C 9.4 0 9.25 0.07 9.14 0.19 ' +
  'C 8.17 1.3 5.84 4.57 5.84 10 L 5.84 12.4 L 5.4 12.7 C 4.53 13.28 4.02 14.25 4.02 15.29 L 4.02 18.18 ' +
  'C 4.02 18.35 4.11 18.5 4.26 18.59 C 4.41 18.67 4.6 18.66 4.74 18.57 L 6.19 17.6 C 6.6 17.33 7.07 17.18 ' +
  '7.56 17.18 L 8.63 17.18 L 8.63 18.58 C 8.63 18.84 8.84 19.05 9.1 19.05 L 9.95 19.05 C 10.2 19.05 10.41 ' +
  '18.84 10.41 18.58 L 10.41 17.18 L 11.48 17.18 C 11.97 17.18 12.45 17.32 12.86 17.6 L 14.31 18.57 C ' +
  '14.45 18.66 14.63 18.67 14.79 18.59 C 14.94 18.5 15.03 18.35 15.03 18.18 L 15.03 15.29 C 15.03 14.25 ' +
  '14.51 13.28 13.65 12.7 Z M 9.52 8.6 C 8.64 8.6 7.92 7.89 7.92 7 C 7.92 6.11 8.64 5.4 9.52 5.4 C 10.41 ' +
  '5.4 11.13 6.11 11.13 7 C 11.13 7.89 10.41 8.6 9.52 8.6 Z';

const GREEN = 'green';
const RED = 'red';

function rocketIcon(fill: string): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="19pt" height="19pt" viewBox="0 0 19 19">` +
    `<path style="stroke:none;fill-rule:nonzero;fill:${fill};" d="${ROCKET_PATH}"/></svg>`
  );
}

// Cible à trois anneaux ; le cas partiel mélange les couleurs.
function landingIcon(outer: string, middle: string, center: string): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="20pt" height="20pt" viewBox="0 0 20 20">` +
    `<circle cx="9.94" cy="9.87" r="9" style="fill:none;stroke:${outer};stroke-width:1.8;"/>` +
    `<circle cx="9.93" cy="9.63" r="5.1" style="fill:none;stroke:${middle};stroke-width:1.8;"/>` +
    `<circle cx="9.93" cy="9.58" r="1.55" style="fill:${center};"/></svg>`
  );
}

export const LAUNCH_SUCCESS_ICON = rocketIcon(GREEN);
export const LAUNCH_FAILURE_ICON = rocketIcon(RED);

export const RECOVERY_SUCCESS_ICON = landingIcon(GREEN, GREEN, GREEN);
export const RECOVERY_FAILURE_ICON = landingIcon(RED, RED, RED);
export const RECOVERY_PARTIAL_ICON = landingIcon(GREEN, RED, GREEN);

/** Servi sur /assets/default-patch.svg quand un lancement n'a pas d'écusson. */
export const DEFAULT_PATCH_SVG =
  `<svg xmlns="http://www.w3.org/2000/svg" width="256" height="256" viewBox="0 0 19 19">` +
  `<circle cx="9.5" cy="9.5" r="9.3" style="fill:#0b1d3a;"/>` +
  `<g transform="translate(4.75 3.6) scale(0.5)">` +
  `<path style="fill:#f5f5f5;" d="${ROCKET_PATH}"/></g></svg>`;
