// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Topic: Gamma function
// ─────────────────────────────────────────────────────────────

import { div, Expr, mul, pow, sub } from '../core/expr';
import type { Corpus } from './corpus';

export function loadGammaFunction(corpus: Corpus): void {
    const table = corpus.table;
    const [
        Title, Section, Entries, EntryReference, Description,
        ID, Formula, Variables, Assumptions,
        Table, TableRelation, TableHeadings, TableSplit, TableSection, List,
    ] = table.symbols(`
        Title Section Entries EntryReference Description
        ID Formula Variables Assumptions
        Table TableRelation TableHeadings TableSplit TableSection List`);
    const [
        Equal, Unequal, Greater, Element, NotElement, And, Implies,
        Tuple, Set, SetMinus, Union, OpenInterval, ZZGreaterEqual, ZZLessEqual,
        CC, RR, ZZ, Infinity, UnsignedInfinity, ConstI, ConstPi, Decimal,
        GammaFunction, Factorial, RisingFactorial, Sqrt, Sin, Exp, Re, Conjugate,
        Div, Product, Integral, FormalPowerSeries, FormalLaurentSeries, SeriesCoefficient,
        HolomorphicDomain, Poles, EssentialSingularities, BranchPoints, BranchCuts, Zeros,
    ] = table.symbols(`
        Equal Unequal Greater Element NotElement And Implies
        Tuple Set SetMinus Union OpenInterval ZZGreaterEqual ZZLessEqual
        CC RR ZZ Infinity UnsignedInfinity ConstI ConstPi Decimal
        GammaFunction Factorial RisingFactorial Sqrt Sin Exp Re Conjugate
        Div Product Integral FormalPowerSeries FormalLaurentSeries SeriesCoefficient
        HolomorphicDomain Poles EssentialSingularities BranchPoints BranchCuts Zeros`);
    const [z, n, k, m, t, x, P, Q, pi] = table.symbols('z n k m t x P Q pi');

    const Gamma = (arg: Expr | number): Expr => GammaFunction.of(arg);
    const gammaDomain = SetMinus.of(CC, ZZLessEqual.of(0));
    const gammaShiftedDomain = SetMinus.of(CC, ZZLessEqual.of(1));
    const extendedPlane = Union.of(CC, Set.of(UnsignedInfinity));
    const half = Div.of(1, 2);

    corpus.defTopic(
        Title.of('Gamma function'),
        Section.of('Domain'),
        Entries.of('09e2ed'),
        Section.of('Particular values'),
        Entries.of('f1d31a', 'e68d11', '19d480', 'f826a6', '48ac55'),
        Section.of('Functional equations'),
        Entries.of('78f1f4', '639d91', '14af98', '56d710', 'b510b6', 'a787eb', '90a1e1'),
        Section.of('Integral representations'),
        Entries.of('4e4e0f'),
        Section.of('Analytic properties'),
        Entries.of('798c5d', '2870f0', '34d6ae', 'd086bd', '9a44c5', 'a76328'),
        Section.of('Complex parts'),
        Entries.of('d7d2a0'),
    );

    table.describeBrief(GammaFunction, Gamma(z), 'Gamma function', '09e2ed', Description.of(
        'The gamma function is a function of one variable.',
        'It is a meromorphic function on the complex plane with simple poles at the nonpositive integers and no zeros.',
        'It can be defined in the right half-plane by the integral representation', EntryReference.of('4e4e0f'),
        'together with the functional equation', EntryReference.of('78f1f4'), 'for analytic continuation.'));

    // ── Domain ──────────────────────────────────────────────

    const row = (domain: Expr, codomain: Expr): Expr => Tuple.of(domain, codomain);
    const seriesRow = (ring: Expr): Expr => row(
        And.of(Element.of(z, FormalPowerSeries.of(ring, x)), NotElement.of(SeriesCoefficient.of(z, x, 0), ZZLessEqual.of(0))),
        And.of(Element.of(Gamma(z), FormalPowerSeries.of(ring, x)), Unequal.of(SeriesCoefficient.of(Gamma(z), x, 0), 0)));
    const laurentRow = (ring: Expr): Expr => row(
        And.of(Element.of(z, FormalLaurentSeries.of(ring, x)), NotElement.of(z, ZZLessEqual.of(0))),
        Element.of(Gamma(z), FormalLaurentSeries.of(ring, x)));

    corpus.makeEntry(ID.of('09e2ed'),
        Description.of('Domain and codomain definitions for', Gamma(z)),
        Table.of(TableRelation.of(Tuple.of(P, Q), Implies.of(P, Q)),
            TableHeadings.of(Description.of('Domain'), Description.of('Codomain')), TableSplit.of(1),
            List.of(
                TableSection.of('Numbers'),
                row(Element.of(z, ZZGreaterEqual.of(1)), Element.of(Gamma(z), ZZGreaterEqual.of(1))),
                row(Element.of(z, OpenInterval.of(0, Infinity)), Element.of(Gamma(z), OpenInterval.of(Decimal.of('0.8856'), Infinity))),
                row(Element.of(z, SetMinus.of(RR, ZZLessEqual.of(0))), Element.of(Gamma(z), SetMinus.of(RR, Set.of(0)))),
                row(Element.of(z, gammaDomain), Element.of(Gamma(z), SetMinus.of(CC, Set.of(0)))),
                TableSection.of('Infinities'),
                row(Element.of(z, ZZLessEqual.of(0)), Element.of(Gamma(z), Set.of(UnsignedInfinity))),
                row(Element.of(z, Set.of(Infinity)), Element.of(Gamma(z), Set.of(Infinity))),
                row(Element.of(z, Set.of(ConstI.mul(Infinity), ConstI.mul(Infinity).neg())), Element.of(Gamma(z), Set.of(0))),
                TableSection.of('Formal power and Laurent series'),
                seriesRow(RR),
                seriesRow(CC),
                laurentRow(RR),
                laurentRow(CC),
            )));

    // ── Particular values ───────────────────────────────────

    corpus.makeEntry(ID.of('f1d31a'),
        Formula.of(Equal.of(Gamma(n), Factorial.of(n.sub(1)))),
        Variables.of(n),
        Assumptions.of(Element.of(n, gammaDomain)));

    corpus.makeEntry(ID.of('e68d11'),
        Formula.of(Equal.of(Gamma(1), 1)));

    corpus.makeEntry(ID.of('19d480'),
        Formula.of(Equal.of(Gamma(2), 1)));

    corpus.makeEntry(ID.of('f826a6'),
        Formula.of(Equal.of(Gamma(half), Sqrt.of(ConstPi))));

    corpus.makeEntry(ID.of('48ac55'),
        Formula.of(Equal.of(Gamma(Div.of(3, 2)), Sqrt.of(ConstPi).div(2))));

    // ── Functional equations ────────────────────────────────

    corpus.makeEntry(ID.of('78f1f4'),
        Formula.of(Equal.of(Gamma(z.add(1)), z.mul(Gamma(z)))),
        Variables.of(z),
        Assumptions.of(Element.of(z, gammaDomain)));

    corpus.makeEntry(ID.of('639d91'),
        Formula.of(Equal.of(Gamma(z), z.sub(1).mul(Gamma(z.sub(1))))),
        Variables.of(z),
        Assumptions.of(Element.of(z, gammaShiftedDomain)));

    corpus.makeEntry(ID.of('14af98'),
        Formula.of(Equal.of(Gamma(z.sub(1)), Gamma(z).div(z.sub(1)))),
        Variables.of(z),
        Assumptions.of(Element.of(z, gammaShiftedDomain)));

    corpus.makeEntry(ID.of('56d710'),
        Formula.of(Equal.of(Gamma(z.add(n)), RisingFactorial.of(z, n).mul(Gamma(z)))),
        Variables.of(z, n),
        Assumptions.of(And.of(Element.of(z, gammaDomain), Element.of(n, ZZGreaterEqual.of(0)))));

    corpus.makeEntry(ID.of('b510b6'),
        Formula.of(Equal.of(Gamma(z), ConstPi.div(Sin.of(ConstPi.mul(z))).mul(div(1, Gamma(sub(1, z)))))),
        Variables.of(z),
        Assumptions.of(Element.of(z, SetMinus.of(CC, ZZ))));

    corpus.makeEntry(ID.of('a787eb'),
        Formula.of(Equal.of(
            Gamma(z).mul(Gamma(z.add(half))),
            pow(2, sub(1, mul(2, z))).mul(Sqrt.of(ConstPi)).mul(Gamma(mul(2, z))))),
        Variables.of(z),
        Assumptions.of(And.of(Element.of(z, CC), NotElement.of(mul(2, z), ZZLessEqual.of(0)))));

    corpus.makeEntry(ID.of('90a1e1'),
        Formula.of(Equal.of(
            Product.of(Gamma(z.add(Div.of(k, m))), Tuple.of(k, 0, m.sub(1))),
            mul(2, pi).pow(m.sub(1).div(2)).mul(m.pow(half.sub(m.mul(z)))).mul(Gamma(m.mul(z))))),
        Variables.of(z),
        Assumptions.of(And.of(Element.of(z, CC), Element.of(m, ZZGreaterEqual.of(1)), NotElement.of(m.mul(z), ZZLessEqual.of(0)))));

    // ── Integral representations ────────────────────────────

    corpus.makeEntry(ID.of('4e4e0f'),
        Formula.of(Equal.of(Gamma(z), Integral.of(t.pow(z.sub(1)).mul(Exp.of(t.neg())), Tuple.of(t, 0, Infinity)))),
        Variables.of(z),
        Assumptions.of(And.of(Element.of(z, CC), Greater.of(Re.of(z), 0))));

    // ── Analytic properties ─────────────────────────────────

    corpus.makeEntry(ID.of('798c5d'),
        Formula.of(Equal.of(HolomorphicDomain.of(Gamma(z), z, extendedPlane), gammaDomain)));

    corpus.makeEntry(ID.of('2870f0'),
        Formula.of(Equal.of(Poles.of(Gamma(z), z, extendedPlane), ZZLessEqual.of(0))));

    corpus.makeEntry(ID.of('34d6ae'),
        Formula.of(Equal.of(EssentialSingularities.of(Gamma(z), z, extendedPlane), Set.of(UnsignedInfinity))));

    corpus.makeEntry(ID.of('d086bd'),
        Formula.of(Equal.of(BranchPoints.of(Gamma(z), z, extendedPlane), Set.of())));

    corpus.makeEntry(ID.of('9a44c5'),
        Formula.of(Equal.of(BranchCuts.of(Gamma(z), z, CC), Set.of())));

    corpus.makeEntry(ID.of('a76328'),
        Formula.of(Equal.of(Zeros.of(Gamma(z), z, CC), Set.of())));

    // ── Complex parts ───────────────────────────────────────

    corpus.makeEntry(ID.of('d7d2a0'),
        Formula.of(Equal.of(Gamma(Conjugate.of(z)), Conjugate.of(Gamma(z)))),
        Variables.of(z),
        Assumptions.of(Element.of(z, gammaDomain)));
}
