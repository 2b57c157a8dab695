import { renderToStaticMarkup } from 'react-dom/server'
import { CartesianGrid, Customized, Line, LineChart, XAxis, YAxis } from 'recharts'
import { atomicWrite } from '../utils/fs.js'
import type { PlotData, PlotRenderer, PlotSeries } from './plot.js'

const WIDTH = 960
const HEIGHT = 560
const SERIES_COLORS = ['#2563eb', '#dc2626', '#16a34a', '#9333ea', '#ea580c', '#0891b2', '#ca8a04', '#db2777']

function seriesColor(index: number): string {
  return SERIES_COLORS[index % SERIES_COLORS.length] ?? '#111827'
}

function formatTick(value: number): string {
  return String(Number(value.toPrecision(4)))
}

/** Title and legend drawn inside the SVG; recharts' own legend is HTML. */
function ChartDecorations({ title, series }: { title: string; series: readonly PlotSeries[] }) {
  return (
    <g className="sweepstat-decorations">
      <text x={WIDTH / 2} y={24} textAnchor="middle" fontSize={16} fontWeight="bold" fill="#111827">
        {title}
      </text>
      {series.map((s, index) => (
        <g key={s.name} transform={`translate(${WIDTH - 180}, ${50 + index * 20})`}>
          <line x1={0} y1={0} x2={24} y2={0} stroke={seriesColor(index)} strokeWidth={2} />
          <text x={30} y={4} fontSize={12} fill="#374151">
            {s.name}
          </text>
        </g>
      ))}
    </g>
  )
}

function PlotChart({ plot }: { plot: PlotData }) {
  const xValues = [...new Set(plot.series.flatMap((s) => s.points.map((point) => point.x)))].sort((a, b) => a - b)
  const labels = new Map((plot.xTicks ?? []).map((tick) => [tick.value, tick.label]))
  const ticks = plot.xTicks?.map((tick) => tick.value) ?? xValues

  return (
    <LineChart width={WIDTH} height={HEIGHT} margin={{ top: 40, right: 200, bottom: 40, left: 40 }}>
      <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
      <XAxis
        type="number"
        dataKey="x"
        scale={plot.logScaleX ? 'log' : 'auto'}
        domain={['dataMin', 'dataMax']}
        ticks={ticks}
        tickFormatter={(value: number) => labels.get(value) ?? formatTick(value)}
        label={{ value: plot.xLabel, position: 'insideBottom', offset: -20 }}
      />
      <YAxis
        type="number"
        dataKey="y"
        tickFormatter={formatTick}
        label={{ value: plot.yLabel, angle: -90, position: 'insideLeft' }}
      />
      {plot.series.map((s, index) => (
        <Line
          key={s.name}
          name={s.name}
          data={[...s.points]}
          dataKey="y"
          type="linear"
          stroke={seriesColor(index)}
          strokeWidth={2}
          dot={{ r: 4 }}
          isAnimationActive={false}
        />
      ))}
      <Customized component={<ChartDecorations title={plot.title} series={plot.series} />} />
    </LineChart>
  )
}

/** Renders the chart to a standalone SVG document. */
export function renderPlotSvg(plot: PlotData): string {
  const markup = renderToStaticMarkup(<PlotChart plot={plot} />)
  const start = markup.indexOf('<svg')
  const end = markup.lastIndexOf('</svg>')
  if (start < 0 || end < 0) {
    throw new Error('chart rendering produced no <svg> element')
  }
  const svg = markup.slice(start, end + '</svg>'.length)
  return svg.includes('xmlns=') ? svg : svg.replace('<svg', '<svg xmlns="http://www.w3.org/2000/svg"')
}

export class SvgPlotRenderer implements PlotRenderer {
  async render(plot: PlotData, outputPath: string): Promise<void> {
    await atomicWrite(outputPath, renderPlotSvg(plot) + '\n')
  }
}
