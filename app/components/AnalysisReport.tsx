// app/components/AnalysisReport.tsx
"use client";

import type { CSSProperties } from "react";
import { HelpTip } from "@/app/components/HelpTip";
import { bandLabel, gaugePercent, scoreBand } from "@/lib/gauge";
import type { AnalysisReport as Report } from "@/lib/types";

type CSSVars = CSSProperties & {
  [key: `--${string}`]: string | number;
};

function ScoreGauge({ score }: { score: number }) {
  const band = scoreBand(score);
  const style: CSSVars = { "--gaugeFill": gaugePercent(score) };

  return (
    <div className={`gauge ${band}`} style={style} role="img" aria-label={`Trust score ${score} out of 10`}>
      <div className="gaugeDial">
        <span className="gaugeValue">{Number.isInteger(score) ? score : score.toFixed(1)}</span>
        <span className="gaugeMax">/ 10</span>
      </div>
      <HelpTip text="0–4 low, 4–7 caution, 7–10 likely credible. Estimated by the model, not computed.">
        <span className="gaugeTitle">Trust Score · {bandLabel(band)}</span>
      </HelpTip>
    </div>
  );
}

export function AnalysisReport({ report }: { report: Report }) {
  return (
    <section className="results" aria-label="Analysis report">
      <h2 className="reportHeading">Analysis Report</h2>

      <div className="reportTop">
        <ScoreGauge score={report.credibilityScore} />

        <div className="vox-card">
          <h3 className="cardTitle">Quick Summary</h3>
          <p className="summaryText">{report.summary}</p>
        </div>
      </div>

      <h3 className="cardTitle">Detected Red Flags</h3>
      {report.redFlags.length > 0 ? (
        <ul className="flagList">
          {report.redFlags.map((flag, i) => (
            <li key={i} className="flag">
              <strong>{flag.flagType}:</strong> {flag.description}
            </li>
          ))}
        </ul>
      ) : (
        <div className="ok-box">No significant red flags were detected.</div>
      )}

      <details className="vox-card" open>
        <summary className="summary">
          <strong>Educational insight</strong>
        </summary>
        <div className="caption">{report.educationalInsight}</div>
      </details>
    </section>
  );
}
