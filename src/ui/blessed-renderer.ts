import * as blessed from 'blessed';
import * as contrib from 'blessed-contrib';
import type { Widgets } from 'blessed';
import { Tab } from '../core/dashboard-state';
import {
  cpuGauge,
  diskLines,
  headerLine,
  helpLines,
  memoryGauge,
  networkLines,
  processLines,
  statusLine,
  systemLines,
  toChartSeries,
} from './views';
import type { Frame, Renderer, Viewport } from '../core/render-driver';
import type { DisplayConfig } from '../types/schemas';
import type { BlessedTerminal } from './terminal';

const HEADER_ROWS = 1;
const STATUS_ROWS = 1;
const BORDER_ROWS = 2;
const GAUGE_ROWS = 4;
/** Columns taken by the chart border and y-axis labels */
const CHART_PADDING = 10;

// Type alias so Object.entries keeps the widget types
type PanelSet = {
  header: Widgets.BoxElement;
  status: Widgets.BoxElement;
  gauges: Widgets.BoxElement;
  cpuChart: contrib.Widgets.LineElement;
  memoryChart: contrib.Widgets.LineElement;
  system: Widgets.BoxElement;
  disks: Widgets.BoxElement;
  processes: Widgets.BoxElement;
  network: Widgets.BoxElement;
  help: Widgets.BoxElement;
};

export interface BlessedRendererOptions {
  title: string;
  display: DisplayConfig;
}

function cells(value: number | string | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function panel(screen: Widgets.Screen, label: string, position: Widgets.BoxOptions = {}): Widgets.BoxElement {
  return blessed.box({
    ...position,
    parent: screen,
    label: ` ${label} `,
    tags: true,
    border: { type: 'line' },
    style: { border: { fg: 'cyan' } },
    hidden: true,
  });
}

function chart(screen: Widgets.Screen, label: string): contrib.Widgets.LineElement {
  const line = contrib.line({
    label: ` ${label} `,
    minY: 0,
    maxY: 100,
    showLegend: false,
    wholeNumbersOnly: true,
    xLabelPadding: 3,
    xPadding: 5,
    border: { type: 'line', fg: 'cyan' },
    style: { line: 'yellow', text: 'green', baseline: 'black' },
    hidden: true,
  });
  screen.append(line);
  return line;
}

/**
 * Paints frames onto the blessed screen owned by a BlessedTerminal. Widgets
 * are created on the first paint and re-laid out on every frame.
 */
export class BlessedRenderer implements Renderer {
  private readonly terminal: BlessedTerminal;
  private readonly options: BlessedRendererOptions;
  private widgets: PanelSet | null = null;

  constructor(terminal: BlessedTerminal, options: BlessedRendererOptions) {
    this.terminal = terminal;
    this.options = options;
  }

  viewport(): Viewport {
    const { rows, cols } = this.size();
    return {
      processRows: Math.max(0, rows - HEADER_ROWS - STATUS_ROWS - BORDER_ROWS - 1),
      chartColumns: Math.max(0, Math.floor(cols / 2) - CHART_PADDING),
    };
  }

  paint(frame: Frame): void {
    const widgets = this.ensureWidgets();
    const { rows, cols } = this.size();
    const display = this.options.display;

    widgets.header.setContent(headerLine(this.options.title, frame.tab));
    widgets.status.setContent(statusLine(frame));

    const visible = new Set<string>(['header', 'status']);

    switch (frame.tab) {
      case Tab.Overview: {
        const chartTop = HEADER_ROWS + GAUGE_ROWS;
        const chartHeight = Math.max(6, Math.floor((rows - chartTop - STATUS_ROWS) / 2));
        const lowerTop = display.show_cpu_graph || display.show_memory_graph ? chartTop + chartHeight : chartTop;
        const gaugeWidth = Math.max(10, Math.floor(cols / 2) - 10);

        widgets.gauges.setContent(`${cpuGauge(frame.metrics, gaugeWidth)}\n${memoryGauge(frame.metrics, gaugeWidth)}`);
        visible.add('gauges');

        if (display.show_cpu_graph) {
          place(widgets.cpuChart, chartTop, 0, '50%', chartHeight);
          if (frame.cpuSeries.length > 0) {
            widgets.cpuChart.setData([toChartSeries('CPU', frame.cpuSeries, 'yellow')]);
          }
          visible.add('cpuChart');
        }
        if (display.show_memory_graph) {
          place(widgets.memoryChart, chartTop, '50%', '50%', chartHeight);
          if (frame.memorySeries.length > 0) {
            widgets.memoryChart.setData([toChartSeries('Memory', frame.memorySeries, 'magenta')]);
          }
          visible.add('memoryChart');
        }

        const lowerHeight = Math.max(BORDER_ROWS + 1, rows - lowerTop - STATUS_ROWS);
        place(widgets.system, lowerTop, 0, display.show_disk_info ? '50%' : '100%', lowerHeight);
        widgets.system.setContent(systemLines(frame.metrics));
        visible.add('system');

        if (display.show_disk_info) {
          place(widgets.disks, lowerTop, '50%', '50%', lowerHeight);
          widgets.disks.setContent(diskLines(frame.metrics));
          visible.add('disks');
        }
        break;
      }
      case Tab.Processes:
        widgets.processes.setContent(
          display.show_process_list ? processLines(frame) : 'Process list is disabled in the configuration',
        );
        visible.add('processes');
        break;
      case Tab.Network:
        widgets.network.setContent(
          display.show_network_info ? networkLines(frame.metrics) : 'Network panel is disabled in the configuration',
        );
        visible.add('network');
        break;
      case Tab.Help:
        widgets.help.setContent(helpLines());
        visible.add('help');
        break;
    }

    for (const [name, widget] of Object.entries(widgets)) {
      if (visible.has(name)) widget.show();
      else widget.hide();
    }

    this.terminal.render();
  }

  private size(): { rows: number; cols: number } {
    const screen = this.terminal.screen;
    return { rows: cells(screen.height, 24), cols: cells(screen.width, 80) };
  }

  private ensureWidgets(): PanelSet {
    if (this.widgets !== null) return this.widgets;

    const screen = this.terminal.screen;
    const header = blessed.box({ parent: screen, top: 0, left: 0, width: '100%', height: HEADER_ROWS, tags: true, style: { fg: 'white', bg: 'blue' } });
    const status = blessed.box({ parent: screen, bottom: 0, left: 0, width: '100%', height: STATUS_ROWS, tags: true, style: { fg: 'black', bg: 'white' } });
    const gauges = panel(screen, 'Usage');
    place(gauges, HEADER_ROWS, 0, '100%', GAUGE_ROWS);

    const fullBody: Widgets.BoxOptions = { top: HEADER_ROWS, left: 0, width: '100%', bottom: STATUS_ROWS };

    this.widgets = {
      header,
      status,
      gauges,
      cpuChart: chart(screen, 'CPU %'),
      memoryChart: chart(screen, 'Memory %'),
      system: panel(screen, 'System'),
      disks: panel(screen, 'Disks'),
      processes: panel(screen, 'Processes', fullBody),
      network: panel(screen, 'Network', fullBody),
      help: panel(screen, 'Help', fullBody),
    };
    return this.widgets;
  }
}

function place(
  element: Widgets.BlessedElement,
  top: number,
  left: number | string,
  width: number | string,
  height: number,
): void {
  element.top = top;
  element.left = left;
  element.width = width;
  element.height = height;
}
