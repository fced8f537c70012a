/**
 * Terminal styling. Passed to the view as a prop; nothing here is mutated.
 */

type Color = string;

export interface Theme {
  header: { color: Color; bold: boolean };
  ownMessage: Color;
  otherMessage: Color;
  notice: Color;
  error: Color;
  tab: { color: Color; backgroundColor: Color };
  activeTab: { color: Color; backgroundColor: Color };
  presence: { borderColor: Color; onlineUser: Color; width: number };
  /** Rows taken by everything other than the message pane. */
  chromeRows: number;
}

export const defaultTheme: Readonly<Theme> = {
  header: { color: 'whiteBright', bold: true },
  ownMessage: 'cyanBright',
  otherMessage: 'whiteBright',
  notice: 'yellow',
  error: 'redBright',
  tab: { color: 'whiteBright', backgroundColor: 'gray' },
  activeTab: { color: 'black', backgroundColor: 'blueBright' },
  presence: { borderColor: 'gray', onlineUser: 'greenBright', width: 22 },
  chromeRows: 6,
};
