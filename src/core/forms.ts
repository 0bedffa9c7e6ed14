// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Operator Kinds
// Heads with a dedicated printing rule, resolved once per
// symbol when it is registered
// ─────────────────────────────────────────────────────────────

// ── Special LaTeX forms ─────────────────────────────────────

export const LATEX_FORMS = [
    // arithmetic
    'Exp', 'Div', 'Where', 'Pos', 'Neg', 'Add', 'Sub', 'Mul', 'Pow',
    'Sqrt', 'Abs', 'Floor', 'Ceil', 'Conjugate', 'Decimal',
    // calculus
    'Integral', 'IndefiniteIntegralEqual', 'RealIndefiniteIntegralEqual', 'ComplexIndefiniteIntegralEqual',
    'Sum', 'Product', 'DivisorSum', 'DivisorProduct', 'PrimeSum', 'PrimeProduct',
    'Limit', 'SequenceLimit', 'RealLimit', 'LeftLimit', 'RightLimit', 'ComplexLimit', 'MeromorphicLimit',
    'Minimum', 'Maximum', 'ArgMin', 'ArgMax', 'ArgMinUnique', 'ArgMaxUnique',
    'Supremum', 'Infimum', 'Zeros', 'UniqueZero', 'Solutions', 'UniqueSolution',
    'ComplexZeroMultiplicity', 'Residue',
    'Derivative', 'RealDerivative', 'ComplexDerivative', 'ComplexBranchDerivative', 'MeromorphicDerivative',
    'AsymptoticTo', 'FormalPowerSeries', 'FormalLaurentSeries', 'SeriesCoefficient', 'FormalGenerator',
    // collections and grouping
    'Tuple', 'Set', 'List', 'SetBuilder', 'Cardinality', 'Parentheses', 'Brackets', 'Braces',
    'Call', 'Subscript', 'Matrix2x2', 'Matrix2x1', 'Spectrum', 'Det', 'Cases',
    'ZZGreaterEqual', 'ZZLessEqual', 'ZZBetween',
    'ClosedInterval', 'OpenInterval', 'ClosedOpenInterval', 'OpenClosedInterval',
    'RealBall', 'BernsteinEllipse', 'Lattice', 'DomainCodomain',
    // logic
    'And', 'Or', 'Not', 'Implies', 'Equivalent', 'EqualAndElement', 'ForAll', 'Exists',
    'CongruentMod', 'Odd', 'Even',
    // special functions and sequences
    'BernoulliB', 'Fibonacci', 'BellNumber', 'HarmonicNumber', 'PrimeNumber', 'RiemannZetaZero',
    'DirichletLZero', 'LegendrePolynomialZero', 'GaussLegendreWeight', 'GeneralizedBernoulliB',
    'BesselJ', 'BesselY', 'BesselI', 'BesselK', 'HankelH1', 'HankelH2',
    'BesselJDerivative', 'BesselYDerivative', 'BesselIDerivative', 'BesselKDerivative',
    'CoulombF', 'CoulombG', 'CoulombH', 'CoulombC', 'CoulombSigma',
    'Factorial', 'DoubleFactorial', 'RisingFactorial', 'FallingFactorial', 'Binomial',
    'StirlingCycle', 'StirlingS1', 'StirlingS2', 'LambertW', 'LambertWPuiseuxCoefficient',
    'KroneckerDelta', 'LegendreSymbol', 'JacobiSymbol', 'KroneckerSymbol',
    'ModularGroupAction', 'PrimitiveReducedPositiveIntegralBinaryQuadraticForms',
    'HypergeometricUStarRemainder', 'StirlingSeriesRemainder', 'StieltjesGamma',
    'DirichletCharacter', 'DirichletGroup', 'PrimitiveDirichletCharacters', 'GaussSum',
    'DiscreteLog', 'ConreyGenerator', 'QSeriesCoefficient', 'EqualQSeriesEllipsis',
    // prose
    'Description',
] as const;

export type LatexFormKind = typeof LATEX_FORMS[number];

// ── Document structure (HTML only) ──────────────────────────

export const STRUCTURAL_FORMS = [
    'Entry', 'Formula', 'ID', 'Assumptions', 'References', 'Variables', 'Description',
    'Table', 'TableRelation', 'TableHeadings', 'TableColumnHeadings', 'TableSplit', 'TableSection',
    'Topic', 'Title', 'DefinitionsTable', 'Section', 'Subsection', 'SeeTopics', 'Entries',
    'EntryReference', 'SourceForm', 'SymbolDefinition', 'Image', 'ImageSource',
] as const;

export type StructuralKind = typeof STRUCTURAL_FORMS[number];

const latexForms = new Set<string>(LATEX_FORMS);
const structuralForms = new Set<string>(STRUCTURAL_FORMS);

export function isLatexForm(name: string): name is LatexFormKind {
    return latexForms.has(name);
}

export function isStructuralForm(name: string): name is StructuralKind {
    return structuralForms.has(name);
}
