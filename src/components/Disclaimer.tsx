const Disclaimer = () => (
  <div className="card stack">
    <h3>Interpretation</h3>
    <ul>
      <li>
        The chart shows the year-by-year evolution of Life and Non-Life GWP under the current input assumptions.
      </li>
      <li>Adjust the macroeconomic, underwriting and scenario inputs to see how the projections shift.</li>
    </ul>
    <h3>Disclaimers and Limitations</h3>
    <ul>
      <li>This tool implements a simplified six-step GWP projection methodology.</li>
      <li>
        Real-world complexities, such as segmented underwriting and stochastic catastrophe modelling, may require
        more advanced treatment.
      </li>
      <li>
        All results are illustrative and should be reviewed by a qualified actuary before final regulatory
        submissions.
      </li>
    </ul>
  </div>
);

export default Disclaimer;
